/**
 * Swagger decorators shared by the controllers
 */

export * from './webhook.decorators';
export * from './health.decorators';
