/** ASCII magic closing every container file. */
export const FOOTER_MAGIC = 'COFR';
/** `[u32 LE footer length][magic]`. */
export const TRAILER_SIZE = 8;
/** Smallest file that can hold a trailer and a footer. */
export const MIN_CONTAINER_SIZE = 28;
/** Format version written by this library. */
export const FORMAT_VERSION = '1.0.0';
export const MAX_SUPPORTED_MAJOR_VERSION = 1;

/** Metadata stored after the content of every container file. */
export type Footer = {
  /** `major.minor.patch`. */
  version: string;
  isEncrypted: boolean;
  /** Base64 PBKDF2 salt. Present iff `isEncrypted`. */
  salt?: string;
  /** Base64 password verifier. Present iff `isEncrypted`. */
  passwordHash?: string;
  /** Base64 AES-GCM nonce. Present iff `isEncrypted`. */
  iv?: string;
  accountants: string[];
  companyName: string;
  createdAt: Date;
  modifiedAt: Date;
  biometricEnabled: boolean;
};
