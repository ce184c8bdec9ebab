import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigInvalidError } from './errors.js';

const DEFAULT_CONFIG_FILE = path.join('config', 'default.json');

/** [min, max] in milliseconds. */
const msRange = (min: number, max: number) =>
  z
    .tuple([z.coerce.number().nonnegative(), z.coerce.number().nonnegative()])
    .refine(([low, high]) => low <= high, { message: 'Range minimum must not exceed its maximum' })
    .default([min, max]);

const probability = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

// z.coerce.boolean() turns "false" into true, so env flags are parsed explicitly
const flag = (fallback: boolean) =>
  z
    .union([
      z.boolean(),
      z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1'),
    ])
    .default(fallback);

const browserSchema = z.object({
  headless: flag(false),
  sessionFile: z.string().min(1).default('state.json'),
  sessionEncryptionKey: z
    .string()
    .regex(/^[0-9a-fA-F]{64}$/, 'Expected 64 hex characters (32-byte AES key)')
    .optional(),
  viewport: z
    .object({
      width: z.coerce.number().int().positive().default(1280),
      height: z.coerce.number().int().positive().default(720),
    })
    .default({}),
  locale: z.string().min(2).default('es-ES'),
  screenshotsDir: z.string().default('screenshots'),
  screenshotOnError: flag(true),
});

const spreadsheetSchema = z
  .object({
    file: z.string().min(1).default(path.join('data', 'contacts.xlsx')),
    sheetName: z.string().min(1).optional(),
    startRow: z.coerce.number().int().min(2).default(2),
    emailColumn: z.coerce.number().int().min(1).default(1),
    statusColumn: z.coerce.number().int().min(1).default(2),
  })
  .refine((sheet) => sheet.emailColumn !== sheet.statusColumn, {
    message: 'Email and status columns must differ',
    path: ['statusColumn'],
  });

const processingSchema = z.object({
  batchSize: z.coerce.number().int().min(1).max(50).default(10),
  // Terminal statuses a new run treats as pending again
  retryStatuses: z.array(z.enum(['NOT_FOUND', 'ERROR'])).default([]),
});

const selectorsSchema = z.object({
  newMessageButton: z.string().default('button[title="Escribir un mensaje nuevo (N)"]'),
  toField: z.string().default('role=textbox[name="Para"]'),
  token: z.string().default('span'),
  card: z.string().default("div._pe_Y[ispopup='1']"),
  discardButton: z.string().default('button[aria-label="Descartar"]'),
});

const timeoutsSchema = z.object({
  navigationMs: z.coerce.number().int().positive().default(30000),
  cardVisibleMs: z.coerce.number().int().positive().default(5000),
  discardClickMs: z.coerce.number().int().positive().default(2000),
  loginMs: z.coerce.number().int().positive().default(300000), // 5 minutes
});

// Fixed settle times around the compose surface
const waitsSchema = z.object({
  afterOpenSurfaceMs: z.coerce.number().int().nonnegative().default(1000),
  afterFillMs: z.coerce.number().int().nonnegative().default(3000),
  afterBlurMs: z.coerce.number().int().nonnegative().default(500),
  beforeDiscardMs: z.coerce.number().int().nonnegative().default(2000),
  betweenDiscardClicksMs: z.coerce.number().int().nonnegative().default(1000),
});

const delaysSchema = z.object({
  betweenActions: msRange(500, 2000),
  betweenRecords: msRange(3000, 8000),
  afterTyping: msRange(200, 800),
  afterClick: msRange(800, 1500),
  afterCardClose: msRange(1000, 2000),
  cardLoad: msRange(1500, 2500),
});

const antidetectionSchema = z.object({
  randomDelays: flag(true),
  mouseEmulation: flag(true),
  humanTyping: flag(true),
  rotateIdentity: flag(true),
  seed: z.coerce.number().int().optional(),
});

const mouseSchema = z.object({
  offsetPx: z.coerce.number().int().nonnegative().default(10),
  moveDurationMs: msRange(500, 1500),
  overshootProbability: probability(0.15),
  pauseBeforeClickMs: msRange(50, 150),
  steps: z.coerce.number().int().min(2).default(50),
  overshootSteps: z.coerce.number().int().min(2).default(30),
  correctionSteps: z.coerce.number().int().min(2).default(20),
});

const typingSchema = z.object({
  charsPerSecond: z
    .tuple([z.coerce.number().positive(), z.coerce.number().positive()])
    .refine(([low, high]) => low <= high, { message: 'Range minimum must not exceed its maximum' })
    .default([2, 6]),
  mistakeProbability: probability(0.02),
  correctionDelayMs: msRange(100, 300),
  burstChance: probability(0.3),
  burstLength: z.coerce.number().int().nonnegative().default(5),
});

const identitySchema = z.object({
  platform: z.enum(['any', 'windows', 'mac', 'linux']).default('any'),
  poolSize: z.coerce.number().int().min(1).default(20),
  excludeRecent: z.coerce.number().int().nonnegative().default(3),
  historySize: z.coerce.number().int().min(1).default(10),
});

const labelList = (labels: string[]) => z.array(z.string().min(1)).default(labels);

const extractionSchema = z.object({
  genericEmailPrefixes: z.array(z.string().regex(/^[A-Za-z]+$/)).default(['ASP', 'AGM', 'AEM', 'ADM']),
  streetMarker: z.string().min(1).default('C/'),
  sectionHeadings: z
    .array(z.string())
    .default(['CONTACTO', 'NOTAS', 'ORGANIZACIÓN', 'CONTACT', 'NOTES', 'ORGANIZATION']),
  placeholderValues: z.array(z.string()).default(['directorio', 'directory', 'trabajo', 'work']),
  labels: z
    .object({
      department: labelList(['Departamento', 'Department']),
      company: labelList(['Compañía', 'Empresa', 'Company']),
      officeLocation: labelList(['Oficina', 'Office']),
      phone: labelList(['Trabajo', 'Work']),
      sip: labelList(['MI', 'IM']),
      address: labelList(['Dirección profesional', 'Business Address']),
    })
    .default({}),
});

export const configSchema = z.object({
  pageUrl: z.string().url().default('https://mail.example.org/owa/#path=/mail'),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  browser: browserSchema.default({}),
  spreadsheet: spreadsheetSchema.default({}),
  processing: processingSchema.default({}),
  selectors: selectorsSchema.default({}),
  timeouts: timeoutsSchema.default({}),
  waits: waitsSchema.default({}),
  delays: delaysSchema.default({}),

  // Behavior simulation
  antidetection: antidetectionSchema.default({}),
  mouse: mouseSchema.default({}),
  typing: typingSchema.default({}),
  identity: identitySchema.default({}),

  extraction: extractionSchema.default({}),
});

export type AppConfig = z.infer<typeof configSchema>;
export type DelayConfig = AppConfig['delays'];
export type DelayCategory = keyof DelayConfig;
export type MouseConfig = AppConfig['mouse'];
export type TypingConfig = AppConfig['typing'];
export type IdentityConfig = AppConfig['identity'];
export type ExtractionConfig = AppConfig['extraction'];

// Environment variables that override a single configuration key
const ENV_OVERRIDES: ReadonlyArray<readonly [string, readonly string[]]> = [
  ['PAGE_URL', ['pageUrl']],
  ['NODE_ENV', ['nodeEnv']],
  ['LOG_LEVEL', ['logLevel']],
  ['HEADLESS', ['browser', 'headless']],
  ['SESSION_FILE', ['browser', 'sessionFile']],
  ['SESSION_ENCRYPTION_KEY', ['browser', 'sessionEncryptionKey']],
  ['SPREADSHEET_FILE', ['spreadsheet', 'file']],
  ['SHEET_NAME', ['spreadsheet', 'sheetName']],
  ['BATCH_SIZE', ['processing', 'batchSize']],
  ['RETRY_STATUSES', ['processing', 'retryStatuses']],
  ['RANDOM_SEED', ['antidetection', 'seed']],
];

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Explicit JSON file; null skips file loading altogether. */
  file?: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setPath(target: Record<string, unknown>, keys: readonly string[], value: unknown): void {
  let node = target;
  for (const key of keys.slice(0, -1)) {
    const next = node[key];
    if (isRecord(next)) {
      node = next;
    } else {
      const created: Record<string, unknown> = {};
      node[key] = created;
      node = created;
    }
  }
  node[keys[keys.length - 1]] = value;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function resolveConfigFile(file: string | null | undefined, env: NodeJS.ProcessEnv): string | null {
  if (file === null) return null;

  const requested = file ?? env.CONFIG_FILE;
  if (requested) {
    const resolved = path.resolve(process.cwd(), requested);
    if (!fs.existsSync(resolved)) {
      throw new ConfigInvalidError(`Config file not found: ${resolved}`, { file: ['not found'] });
    }
    return resolved;
  }

  const fallback = path.resolve(process.cwd(), DEFAULT_CONFIG_FILE);
  return fs.existsSync(fallback) ? fallback : null;
}

function readConfigFile(filePath: string | null): Record<string, unknown> {
  if (!filePath) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (err) {
    throw new ConfigInvalidError(
      `Config file ${filePath} is not valid JSON: ${err instanceof Error ? err.message : err}`,
      { file: ['invalid JSON'] }
    );
  }

  if (!isRecord(parsed)) {
    throw new ConfigInvalidError(`Config file ${filePath} must contain a JSON object`, {
      file: ['expected an object'],
    });
  }
  return parsed;
}

/**
 * Validate a raw configuration object and return the frozen result.
 */
export function parseConfig(raw: unknown): AppConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const fieldErrors: Record<string, string[]> = {};
    for (const issue of parsed.error.issues) {
      const key = issue.path.join('.') || '(root)';
      (fieldErrors[key] ??= []).push(issue.message);
    }
    throw new ConfigInvalidError(
      `Invalid configuration: ${Object.keys(fieldErrors).join(', ')}`,
      fieldErrors
    );
  }
  return deepFreeze(parsed.data);
}

/**
 * Build the run configuration: JSON file first, then environment overrides,
 * then schema defaults for anything left unset.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const raw = readConfigFile(resolveConfigFile(options.file, env));

  for (const [name, keys] of ENV_OVERRIDES) {
    const value = env[name]?.trim();
    if (!value) continue;

    if (name === 'RETRY_STATUSES') {
      const statuses = value
        .split(',')
        .map((status) => status.trim().toUpperCase())
        .filter(Boolean);
      setPath(raw, keys, statuses);
    } else {
      setPath(raw, keys, value);
    }
  }

  return parseConfig(raw);
}
