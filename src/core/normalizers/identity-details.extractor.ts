import { UserDetails } from '../domain/models';
import {
  Payload,
  isPayload,
  readArray,
  readObject,
  readString,
} from '../utils';

/**
 * Extract canonical user details from an identity provider user payload.
 *
 * Pure function: absent values are omitted from the result, never set to
 * null or undefined, so a later partial update leaves stored columns alone.
 */
export function extractUserDetails(userData: unknown): UserDetails {
  const data: Payload = isPayload(userData) ? userData : {};

  const id = readString(data, 'id');
  const email = pickPrimaryEmail(data);
  const phone = pickPrimaryPhone(data);
  const username = readString(data, 'username');
  const firstName = readString(data, 'first_name');
  const lastName = readString(data, 'last_name');

  return {
    ...(id !== undefined ? { id } : {}),
    ...(email !== undefined ? { email } : {}),
    ...(phone !== undefined ? { phone } : {}),
    ...(username !== undefined ? { username } : {}),
    ...(firstName !== undefined ? { first_name: firstName } : {}),
    ...(lastName !== undefined ? { last_name: lastName } : {}),
    full_name: `${firstName ?? ''} ${lastName ?? ''}`.trim(),
  };
}

/**
 * Address flagged as primary, else the first listed address
 */
function pickPrimaryEmail(data: Payload): string | undefined {
  const addresses = readArray(data, 'email_addresses').filter(isPayload);
  const primaryId = readString(data, 'primary_email_address_id');

  const primary = primaryId
    ? addresses.find((address) => readString(address, 'id') === primaryId)
    : undefined;

  return (
    readString(primary, 'email_address') ??
    readString(addresses[0], 'email_address')
  );
}

/**
 * Number flagged as primary, else the first verified number
 */
function pickPrimaryPhone(data: Payload): string | undefined {
  const numbers = readArray(data, 'phone_numbers').filter(isPayload);
  const primaryId = readString(data, 'primary_phone_number_id');

  if (primaryId) {
    const primary = numbers.find(
      (phone) => readString(phone, 'id') === primaryId,
    );
    const primaryNumber = readString(primary, 'phone_number');
    if (primaryNumber !== undefined) {
      return primaryNumber;
    }
  }

  const verified = numbers.find(
    (phone) =>
      readString(readObject(phone, 'verification'), 'status') === 'verified',
  );
  return readString(verified, 'phone_number');
}
