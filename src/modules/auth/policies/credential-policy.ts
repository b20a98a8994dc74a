export const USERNAME_MIN_LENGTH = 5;
export const USERNAME_MAX_LENGTH = 30;
export const PASSWORD_MIN_LENGTH = 9;
export const PASSWORD_MAX_LENGTH = 30;

export const USERNAME_FORBIDDEN_CHARACTERS = [
  '$',
  '%',
  '\\',
  '/',
  '<',
  '>',
  ':',
  '^',
  '?',
  '!',
] as const;

const FORBIDDEN = new Set<string>(USERNAME_FORBIDDEN_CHARACTERS);

// Lengths count code points, not UTF-16 units
const length = (value: string): number => [...value].length;

/** Returns the violated rule, or null when the username is acceptable. */
export function usernamePolicyViolation(username: string): string | null {
  const len = length(username);
  if (len < USERNAME_MIN_LENGTH || len > USERNAME_MAX_LENGTH) {
    return `Username must contain ${USERNAME_MIN_LENGTH} to ${USERNAME_MAX_LENGTH} characters`;
  }
  if ([...username].some((c) => FORBIDDEN.has(c))) {
    return `Username must not contain any of ${USERNAME_FORBIDDEN_CHARACTERS.join(' ')}`;
  }
  return null;
}

export function passwordPolicyViolation(password: string): string | null {
  const len = length(password);
  if (len < PASSWORD_MIN_LENGTH || len > PASSWORD_MAX_LENGTH) {
    return `Password must contain ${PASSWORD_MIN_LENGTH} to ${PASSWORD_MAX_LENGTH} characters`;
  }
  if (!/\p{L}/u.test(password) || !/\p{Nd}/u.test(password)) {
    return 'Password must include at least one letter and one digit';
  }
  return null;
}
