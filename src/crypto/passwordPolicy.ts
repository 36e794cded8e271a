export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 128;

export type PasswordStrength = 'Very Weak' | 'Weak' | 'Fair' | 'Strong' | 'Very Strong';

const LETTER = /\p{L}/u;
const DIGIT = /\p{Nd}/u;
const LOWER = /\p{Ll}/u;
const UPPER = /\p{Lu}/u;
const SYMBOL = /[^\p{L}\p{Nd}]/u;

export function isPasswordValid(password: string | null | undefined): boolean {
  return getPasswordValidationError(password) === undefined;
}

/** First rule the password breaks, or `undefined` when it satisfies all of them. */
export function getPasswordValidationError(password: string | null | undefined): string | undefined {
  return getPasswordValidationErrors(password)[0];
}

export function getPasswordValidationErrors(password: string | null | undefined): string[] {
  if (!password) return ['Password is required.'];
  const errors: string[] = [];
  if (password.length < PASSWORD_MIN_LENGTH) {
    errors.push(`Password must be at least ${PASSWORD_MIN_LENGTH} characters long.`);
  }
  if (password.length > PASSWORD_MAX_LENGTH) {
    errors.push(`Password must be no more than ${PASSWORD_MAX_LENGTH} characters long.`);
  }
  if (!LETTER.test(password)) errors.push('Password must contain at least one letter.');
  if (!DIGIT.test(password)) errors.push('Password must contain at least one number.');
  return errors;
}

/** Heuristic strength in [0, 100]. */
export function getPasswordStrengthScore(password: string | null | undefined): number {
  if (!password) return 0;
  let score = Math.min(password.length * 2, 30);
  if (LOWER.test(password)) score += 10;
  if (UPPER.test(password)) score += 15;
  if (DIGIT.test(password)) score += 15;
  if (SYMBOL.test(password)) score += 20;
  if (hasRepeatingRun(password)) score -= 10;
  if (hasSequentialRun(password.toLowerCase())) score -= 10;
  return Math.min(100, Math.max(0, score));
}

export function describePasswordStrength(score: number): PasswordStrength {
  if (score < 20) return 'Very Weak';
  if (score < 40) return 'Weak';
  if (score < 60) return 'Fair';
  if (score < 80) return 'Strong';
  return 'Very Strong';
}

function hasRepeatingRun(value: string): boolean {
  for (let i = 0; i + 2 < value.length; i += 1) {
    if (value[i] === value[i + 1] && value[i + 1] === value[i + 2]) return true;
  }
  return false;
}

// abc, 123, cba, 321
function hasSequentialRun(value: string): boolean {
  for (let i = 0; i + 2 < value.length; i += 1) {
    const a = value.charCodeAt(i);
    const b = value.charCodeAt(i + 1);
    const c = value.charCodeAt(i + 2);
    if (b === a + 1 && c === b + 1) return true;
    if (b === a - 1 && c === b - 1) return true;
  }
  return false;
}
