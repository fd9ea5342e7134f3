import { extractUserDetails } from '../../src';

describe('extractUserDetails', () => {
  it('should pick the email matching primary_email_address_id', () => {
    const details = extractUserDetails({
      id: 'user_1',
      primary_email_address_id: 'e2',
      email_addresses: [
        { id: 'e1', email_address: 'first@example.com' },
        { id: 'e2', email_address: 'primary@example.com' },
      ],
    });

    expect(details.email).toBe('primary@example.com');
  });

  it('should fall back to the first email when no primary matches', () => {
    const details = extractUserDetails({
      id: 'user_1',
      primary_email_address_id: 'missing',
      email_addresses: [
        { id: 'e1', email_address: 'first@example.com' },
        { id: 'e2', email_address: 'second@example.com' },
      ],
    });

    expect(details.email).toBe('first@example.com');
  });

  it('should omit phone when the phone list is empty', () => {
    const details = extractUserDetails({
      id: 'user_1',
      phone_numbers: [],
    });

    expect('phone' in details).toBe(false);
    expect(details).toEqual({ id: 'user_1', full_name: '' });
  });

  it('should prefer the primary phone, then the first verified one', () => {
    const numbers = [
      { id: 'p1', phone_number: '+15550001', verification: { status: 'unverified' } },
      { id: 'p2', phone_number: '+15550002', verification: { status: 'verified' } },
      { id: 'p3', phone_number: '+15550003', verification: { status: 'verified' } },
    ];

    expect(
      extractUserDetails({ primary_phone_number_id: 'p1', phone_numbers: numbers }).phone,
    ).toBe('+15550001');
    expect(extractUserDetails({ phone_numbers: numbers }).phone).toBe('+15550002');
  });

  it('should build full_name from whichever names are present', () => {
    expect(extractUserDetails({ first_name: 'Ada', last_name: 'Lovelace' }).full_name).toBe(
      'Ada Lovelace',
    );
    expect(extractUserDetails({ first_name: 'Ada' }).full_name).toBe('Ada');
    expect(extractUserDetails({ last_name: 'Lovelace' }).full_name).toBe('Lovelace');
  });

  it('should never emit null values', () => {
    const details = extractUserDetails({
      id: 'user_1',
      username: null,
      first_name: 'Ada',
      last_name: null,
      email_addresses: [],
    });

    expect(details).toEqual({
      id: 'user_1',
      first_name: 'Ada',
      full_name: 'Ada',
    });
  });
});
