import { Entity, PrimaryColumn, Column, Index } from 'typeorm';

/**
 * TypeORM entity for the users table
 *
 * Property names match the column names and the UserRecord fields.
 * Timestamps are stored as the ISO-8601 strings the store stamps.
 */
@Entity('users')
@Index(['email'])
@Index(['stripe_customer_id'])
export class UserEntity {
  @PrimaryColumn({ type: 'varchar' })
  id!: string;

  @Column({ type: 'varchar', nullable: true })
  email!: string | null;

  @Column({ type: 'varchar', nullable: true })
  phone!: string | null;

  @Column({ type: 'varchar', nullable: true })
  username!: string | null;

  @Column({ type: 'varchar', nullable: true })
  first_name!: string | null;

  @Column({ type: 'varchar', nullable: true })
  last_name!: string | null;

  @Column({ type: 'varchar', nullable: true })
  full_name!: string | null;

  @Column({ type: 'varchar', nullable: true })
  stripe_customer_id!: string | null;

  @Column({ type: 'boolean', default: false })
  is_subscribed!: boolean;

  @Column({ type: 'varchar', nullable: true })
  stripe_plan_id!: string | null;

  @Column({ type: 'varchar', length: 32 })
  created_at!: string;

  @Column({ type: 'varchar', length: 32 })
  updated_at!: string;
}
