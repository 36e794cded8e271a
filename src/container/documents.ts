import { mkdir, readdir, readFile, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { throwIfAborted } from '../abort.js';
import { ContainerError } from '../errors.js';

export const SETTINGS_DOCUMENT = 'appSettings.json';
export const ID_COUNTERS_DOCUMENT = 'idCounters.json';
export const ACCOUNTANTS_DOCUMENT = 'accountants.json';
/** Subdirectory holding attachment files such as scanned receipts. */
export const ATTACHMENTS_DIRECTORY = 'receipts';
/** How many directory levels below the session root documents are searched for. */
export const DOCUMENT_SEARCH_DEPTH = 3;

/** Collections stored as one JSON array document each. */
export const COLLECTION_DOCUMENTS = [
  'customers.json',
  'products.json',
  'suppliers.json',
  'employees.json',
  'departments.json',
  'categories.json',
  'accountants.json',
  'locations.json',
  'sales.json',
  'purchases.json',
  'invoices.json',
  'payments.json',
  'recurringInvoices.json',
  'inventory.json',
  'stockAdjustments.json',
  'stockTransfers.json',
  'purchaseOrders.json',
  'rentalInventory.json',
  'rentals.json',
  'returns.json',
  'lostDamaged.json',
  'receipts.json',
  'reportTemplates.json'
] as const;

const ID_COUNTER_KEYS = [
  'customer',
  'product',
  'supplier',
  'employee',
  'department',
  'category',
  'accountant',
  'location',
  'sale',
  'purchase',
  'invoice',
  'payment',
  'recurringInvoice',
  'inventoryItem',
  'stockAdjustment',
  'stockTransfer',
  'purchaseOrder',
  'rentalItem',
  'rental',
  'return',
  'lostDamaged',
  'receipt',
  'reportTemplate'
] as const;

/** Fields of `appSettings.json` the container reads back into its footer. */
export const SettingsDocumentSchema = z.object({
  company: z.object({ name: z.string().optional() }).passthrough().optional(),
  security: z.object({ biometricEnabled: z.boolean().optional() }).passthrough().optional()
});

const AccountantsDocumentSchema = z.array(z.object({ name: z.string() }).passthrough());

/** Footer fields derived from the documents of a session directory. */
export type ContainerMetadata = {
  companyName: string;
  accountants: string[];
  biometricEnabled: boolean;
};

type SignalOptions = { signal?: AbortSignal | undefined };

/** Settings written by `create` for a new container named `companyName`. */
export function createDefaultSettings(companyName: string): Record<string, unknown> {
  return {
    appVersion: '1.0.0',
    changesMade: false,
    company: { name: companyName },
    localization: { language: 'English', currency: 'USD', dateFormat: 'MM/DD/YYYY' },
    appearance: { theme: 'System', accentColor: 'Blue' },
    enabledModules: { invoices: true, payments: true, inventory: true, employees: true, rentals: true },
    notifications: {
      lowStockAlert: true,
      outOfStockAlert: true,
      invoiceOverdueAlert: true,
      rentalOverdueAlert: true
    },
    security: { autoLockEnabled: false, autoLockMinutes: 5, biometricEnabled: false, fileEncryptionEnabled: false }
  };
}

/** Write the settings, id counters, one empty array per collection, and the attachments directory. */
export async function writeDefaultDocuments(
  directory: string,
  companyName: string,
  options?: SignalOptions
): Promise<void> {
  const signal = options?.signal;
  await mkdir(directory, { recursive: true });
  await writeJson(path.join(directory, SETTINGS_DOCUMENT), createDefaultSettings(companyName), signal);
  for (const name of COLLECTION_DOCUMENTS) {
    await writeJson(path.join(directory, name), [], signal);
  }
  const counters: Record<string, number> = {};
  for (const key of ID_COUNTER_KEYS) counters[key] = 0;
  await writeJson(path.join(directory, ID_COUNTERS_DOCUMENT), counters, signal);
  await mkdir(path.join(directory, ATTACHMENTS_DIRECTORY), { recursive: true });
}

/**
 * Locate `fileName` in `directory` or up to `maxDepth` levels below it.
 *
 * The directory itself wins; otherwise subdirectories are searched depth-first in
 * name order and the first match is returned.
 */
export async function findFileInDirectory(
  directory: string,
  fileName: string,
  maxDepth = DOCUMENT_SEARCH_DEPTH
): Promise<string | undefined> {
  const direct = path.join(directory, fileName);
  if (await isFile(direct)) return direct;
  if (maxDepth <= 0) return undefined;
  for (const sub of await listSubdirectories(directory)) {
    const found = await findFileInDirectory(path.join(directory, sub), fileName, maxDepth - 1);
    if (found !== undefined) return found;
  }
  return undefined;
}

/** Directory holding `appSettings.json`, or `directory` itself when there is none. */
export async function resolveDocumentDirectory(directory: string): Promise<string> {
  const settings = await findFileInDirectory(directory, SETTINGS_DOCUMENT);
  return settings !== undefined ? path.dirname(settings) : directory;
}

/** Read and validate a document. Returns `undefined` when the document does not exist. */
export async function readDocument<T>(
  directory: string,
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options?: SignalOptions
): Promise<T | undefined> {
  const filePath = await findFileInDirectory(directory, name);
  if (filePath === undefined) return undefined;
  const raw = await readJson(filePath, options?.signal);
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ContainerError('CONTAINER_BAD_FORMAT', `Document ${name} does not match its schema`, {
      context: { document: name },
      cause: parsed.error
    });
  }
  return parsed.data;
}

/** Write `data` as indented JSON, replacing the existing document wherever it lives. */
export async function writeDocument(
  directory: string,
  name: string,
  data: unknown,
  options?: SignalOptions
): Promise<string> {
  const existing = await findFileInDirectory(directory, name);
  const target = existing ?? path.join(await resolveDocumentDirectory(directory), name);
  await writeJson(target, data, options?.signal);
  return target;
}

/** Company name, accountant names and biometric flag for the footer. */
export async function readContainerMetadata(directory: string, options?: SignalOptions): Promise<ContainerMetadata> {
  const signal = options?.signal;
  const settings = await readLenient(directory, SETTINGS_DOCUMENT, SettingsDocumentSchema, signal);
  const accountants = await readLenient(directory, ACCOUNTANTS_DOCUMENT, AccountantsDocumentSchema, signal);

  let companyName = settings?.company?.name ?? '';
  if (companyName === '') {
    const subdirectories = await listSubdirectories(directory);
    companyName = subdirectories[0] ?? path.basename(path.resolve(directory));
  }
  return {
    companyName,
    accountants: accountants?.map((accountant) => accountant.name) ?? [],
    biometricEnabled: settings?.security?.biometricEnabled ?? false
  };
}

// Metadata falls back to defaults when a document is unreadable.
async function readLenient<T>(
  directory: string,
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  signal: AbortSignal | undefined
): Promise<T | undefined> {
  const filePath = await findFileInDirectory(directory, name);
  if (filePath === undefined) return undefined;
  let raw: unknown;
  try {
    raw = await readJson(filePath, signal);
  } catch (err) {
    throwIfAborted(signal);
    if (err instanceof SyntaxError) return undefined;
    throw err;
  }
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

async function readJson(filePath: string, signal: AbortSignal | undefined): Promise<unknown> {
  throwIfAborted(signal);
  const text = await readFile(filePath, signal ? { encoding: 'utf8', signal } : { encoding: 'utf8' });
  return JSON.parse(text);
}

async function writeJson(filePath: string, data: unknown, signal: AbortSignal | undefined): Promise<void> {
  throwIfAborted(signal);
  const text = JSON.stringify(data, null, 2);
  await writeFile(filePath, text, signal ? { encoding: 'utf8', signal } : { encoding: 'utf8' });
}

async function listSubdirectories(directory: string): Promise<string[]> {
  const children = await readdir(directory, { withFileTypes: true });
  return children
    .filter((child) => child.isDirectory())
    .map((child) => child.name)
    .sort();
}

async function isFile(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isFile();
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}
