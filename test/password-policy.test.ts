import test from 'node:test';
import assert from 'node:assert/strict';
import {
  PASSWORD_MAX_LENGTH,
  describePasswordStrength,
  getPasswordStrengthScore,
  getPasswordValidationError,
  getPasswordValidationErrors,
  isPasswordValid
} from '../src/crypto/passwordPolicy.js';

test('valid passwords need 8-128 characters, a letter and a digit', () => {
  for (const password of ['Password1', 'mypassword123', 'MYPASSWORD123', 'MyP@ssw0rd!', '12345678a']) {
    assert.equal(isPasswordValid(password), true, password);
  }
  assert.equal(isPasswordValid(null), false);
  assert.equal(isPasswordValid('a'.repeat(PASSWORD_MAX_LENGTH) + '1'), false);
});

test('first validation error follows rule order', () => {
  assert.equal(getPasswordValidationError('Password123'), undefined);
  assert.equal(getPasswordValidationError(undefined), 'Password is required.');
  assert.equal(getPasswordValidationError(''), 'Password is required.');
  assert.equal(getPasswordValidationError('Pass1'), 'Password must be at least 8 characters long.');
  assert.equal(
    getPasswordValidationError('a'.repeat(PASSWORD_MAX_LENGTH) + '1'),
    'Password must be no more than 128 characters long.'
  );
  assert.equal(getPasswordValidationError('12345678'), 'Password must contain at least one letter.');
  assert.equal(getPasswordValidationError('Password'), 'Password must contain at least one number.');
});

test('all validation errors are reported together', () => {
  assert.deepEqual(getPasswordValidationErrors('Password123'), []);
  assert.deepEqual(getPasswordValidationErrors(null), ['Password is required.']);
  assert.deepEqual(getPasswordValidationErrors('abc'), [
    'Password must be at least 8 characters long.',
    'Password must contain at least one number.'
  ]);
});

test('strength score combines length, character classes and pattern penalties', () => {
  assert.equal(getPasswordStrengthScore(null), 0);
  assert.equal(getPasswordStrengthScore(''), 0);
  assert.equal(getPasswordStrengthScore('a1'), 29);
  assert.equal(getPasswordStrengthScore('aaa'), 6);
  assert.equal(getPasswordStrengthScore('Password123!'), 74);
  assert.equal(getPasswordStrengthScore('password123!'), 59);
  assert.equal(getPasswordStrengthScore('Pmqz597!'), 76);
  assert.equal(getPasswordStrengthScore('Pabc597!'), 66);
  assert.equal(getPasswordStrengthScore('Pcba597!'), 66);
});

test('strength score stays within 0-100', () => {
  const score = getPasswordStrengthScore('MyV3ryStr0ng!P@ssw0rd#2024');
  assert.ok(score >= 0 && score <= 100);
});

test('strength descriptions use fixed bands', () => {
  const cases: Array<[number, string]> = [
    [0, 'Very Weak'],
    [19, 'Very Weak'],
    [20, 'Weak'],
    [39, 'Weak'],
    [40, 'Fair'],
    [59, 'Fair'],
    [60, 'Strong'],
    [79, 'Strong'],
    [80, 'Very Strong'],
    [100, 'Very Strong']
  ];
  for (const [score, expected] of cases) {
    assert.equal(describePasswordStrength(score), expected);
  }
});
