import { z } from 'zod';
import { DEFAULT_BAUD_RATE, DEFAULT_SETTLE_MS, type NixieDisplayOptions } from './displayCore';
import type { DisplayLogEvent } from './displayTypes';
import { InvalidArgumentError } from './errors';
import { MemoryTransport } from './transport/memoryTransport';

const level = z.coerce.number().int().min(0).max(255);

const booleanFlag = z.preprocess(value => (typeof value === 'string' ? parseBoolean(value) : value), z.boolean());

const displayConfigSchema = z.object({
  device: z.string().trim().min(1).optional(),
  tubes: z.coerce.number().int().min(1).default(1),
  baudRate: z.coerce.number().int().positive().default(DEFAULT_BAUD_RATE),
  settleMs: z.coerce.number().int().min(0).default(DEFAULT_SETTLE_MS),
  brightness: level.default(0),
  red: level.default(0),
  green: level.default(0),
  blue: level.default(0),
  dryRun: booleanFlag.default(false),
  port: z.coerce.number().int().min(0).max(65535).optional()
});

export type DisplayConfig = z.infer<typeof displayConfigSchema>;

type ConfigKey = keyof DisplayConfig;

const argumentKeys: Record<string, ConfigKey> = {
  device: 'device',
  tubes: 'tubes',
  baud: 'baudRate',
  'settle-ms': 'settleMs',
  brightness: 'brightness',
  red: 'red',
  green: 'green',
  blue: 'blue',
  'dry-run': 'dryRun',
  port: 'port'
};

const environmentKeys: Record<string, ConfigKey> = {
  NIXIE_DEVICE: 'device',
  NIXIE_TUBES: 'tubes',
  NIXIE_BAUD_RATE: 'baudRate',
  NIXIE_SETTLE_MS: 'settleMs',
  NIXIE_BRIGHTNESS: 'brightness',
  NIXIE_RED: 'red',
  NIXIE_GREEN: 'green',
  NIXIE_BLUE: 'blue',
  NIXIE_DRY_RUN: 'dryRun',
  NIXIE_PORT: 'port'
};

/**
 * Reads `--key=value` arguments over `NIXIE_*` environment variables.
 * A bare `--dry-run` counts as `true`.
 */
export function loadDisplayConfig(argv: readonly string[], env: NodeJS.ProcessEnv): DisplayConfig {
  const raw: Partial<Record<ConfigKey, string>> = {};

  Object.entries(environmentKeys).forEach(([name, key]) => {
    const value = env[name];
    if (value !== undefined && value.trim() !== '') {
      raw[key] = value;
    }
  });

  argv.forEach(arg => {
    if (!arg.startsWith('--')) {
      return;
    }
    const [name = '', ...rest] = arg.slice(2).split('=');
    const key = argumentKeys[name];
    if (!key) {
      return;
    }
    raw[key] = rest.length > 0 ? rest.join('=') : 'true';
  });

  const parsed = displayConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => ({
      key: issue.path.join('.'),
      message: issue.message
    }));
    throw new InvalidArgumentError(
      `Invalid display configuration: ${issues.map(issue => `${issue.key} (${issue.message})`).join(', ')}`,
      { issues }
    );
  }
  return parsed.data;
}

/** Dry-run configurations get an in-memory transport instead of a serial port. */
export function toDisplayOptions(
  config: DisplayConfig,
  logger?: (event: DisplayLogEvent) => void
): NixieDisplayOptions {
  return {
    tubeCount: config.tubes,
    target: config.dryRun ? config.device ?? 'memory' : config.device,
    baudRate: config.baudRate,
    settleMs: config.settleMs,
    brightness: config.brightness,
    red: config.red,
    green: config.green,
    blue: config.blue,
    createTransport: config.dryRun ? target => new MemoryTransport(target) : undefined,
    logger
  };
}

export function parseBoolean(value: string | undefined): boolean | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on') {
    return true;
  }
  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off') {
    return false;
  }
  return undefined;
}
