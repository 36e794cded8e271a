import { z } from 'zod';
import type { Footer } from './types.js';

const timestamp = z
  .string()
  .datetime({ offset: true, local: true })
  .transform((value) => new Date(value));

const encryptionField = z.string().base64().min(1).nullish();

/** Footer JSON as read from disk; unknown keys are ignored. */
export const FooterJsonSchema = z
  .object({
    version: z.string().min(1),
    isEncrypted: z.boolean().default(false),
    salt: encryptionField,
    passwordHash: encryptionField,
    iv: encryptionField,
    accountants: z.array(z.string()).default([]),
    companyName: z.string().default(''),
    createdAt: timestamp,
    modifiedAt: timestamp,
    biometricEnabled: z.boolean().default(false)
  })
  .superRefine((value, ctx) => {
    const present = [value.salt, value.passwordHash, value.iv].filter((field) => field != null).length;
    if (value.isEncrypted ? present !== 3 : present !== 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: value.isEncrypted
          ? 'Encrypted footers need salt, passwordHash and iv'
          : 'Unencrypted footers must not carry salt, passwordHash or iv'
      });
    }
  });

/** Parse footer JSON text. Returns `undefined` for anything that is not a valid footer. */
export function parseFooterJson(text: string): Footer | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = FooterJsonSchema.safeParse(raw);
  if (!parsed.success) return undefined;
  const value = parsed.data;
  const footer: Footer = {
    version: value.version,
    isEncrypted: value.isEncrypted,
    accountants: value.accountants,
    companyName: value.companyName,
    createdAt: value.createdAt,
    modifiedAt: value.modifiedAt,
    biometricEnabled: value.biometricEnabled
  };
  if (value.salt != null) footer.salt = value.salt;
  if (value.passwordHash != null) footer.passwordHash = value.passwordHash;
  if (value.iv != null) footer.iv = value.iv;
  return footer;
}

/** Compact footer JSON with keys in their canonical order. */
export function serializeFooter(footer: Footer): string {
  return JSON.stringify({
    version: footer.version,
    isEncrypted: footer.isEncrypted,
    ...(footer.isEncrypted
      ? { salt: footer.salt, passwordHash: footer.passwordHash, iv: footer.iv }
      : {}),
    accountants: footer.accountants,
    companyName: footer.companyName,
    createdAt: footer.createdAt.toISOString(),
    modifiedAt: footer.modifiedAt.toISOString(),
    biometricEnabled: footer.biometricEnabled
  });
}
