import { parseArgs } from 'node:util';
import { z } from 'zod';
import { ConfigError } from './errors';
import { DEFAULT_TIMESTAMP_FORMAT, validateTimestampFormat } from './time-format';
import { MonitorConfig } from './types';

export const USAGE = `Usage: ping -D <host> | probe-sieve [options]

Reads "ping -D" output on stdin and forwards only interesting lines
(slow replies, missed sequence numbers, probe errors) to stdout.
Send SIGUSR1 to print a status line to stderr.

Options:
  -t, --max-time-ms <T>         forward replies slower than T ms (default 500)
      --fmt <pattern>           strftime-style timestamp prefix (default "${DEFAULT_TIMESTAMP_FORMAT}")
      --heartbeat-interval <H>  print a heartbeat to stderr after H quiet seconds (default 0, off)
      --allowed-seq-diff <N>    forward when N or more probes are missing (default 1)
      --timestamp-source <src>  "arrival" (time of processing) or "probe" (ping's own stamp)
      --forward-flagged         also forward replies marked (DUP!), (BAD CHECKSUM!), ...
      --final-status            print a status line to stderr at end of input
  -h, --help                    show this help
`;

const ENV_KEYS: Array<[keyof MonitorConfig, string]> = [
  ['maxRoundtripMillis', 'PROBE_SIEVE_MAX_TIME_MS'],
  ['timestampFormat', 'PROBE_SIEVE_FMT'],
  ['heartbeatIntervalSeconds', 'PROBE_SIEVE_HEARTBEAT_INTERVAL'],
  ['allowedSequenceGap', 'PROBE_SIEVE_ALLOWED_SEQ_DIFF'],
  ['timestampSource', 'PROBE_SIEVE_TIMESTAMP_SOURCE'],
  ['forwardFlaggedReplies', 'PROBE_SIEVE_FORWARD_FLAGGED'],
  ['finalStatus', 'PROBE_SIEVE_FINAL_STATUS']
];

const numberFromText = z.coerce.number({ invalid_type_error: 'must be a number' });

const booleanFromText = z.union([
  z.boolean(),
  z
    .string()
    .trim()
    .toLowerCase()
    .refine((value) => ['1', '0', 'true', 'false', 'yes', 'no'].includes(value), 'must be true or false')
    .transform((value) => value === '1' || value === 'true' || value === 'yes')
]);

const configSchema = z.object({
  maxRoundtripMillis: numberFromText.finite().nonnegative().default(500),
  timestampFormat: z
    .string()
    .min(1, 'must not be empty')
    .superRefine((pattern, ctx) => {
      for (const problem of validateTimestampFormat(pattern)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
      }
    })
    .default(DEFAULT_TIMESTAMP_FORMAT),
  heartbeatIntervalSeconds: numberFromText.finite().default(0),
  allowedSequenceGap: numberFromText.int('must be an integer').min(1).default(1),
  timestampSource: z.enum(['arrival', 'probe']).default('arrival'),
  forwardFlaggedReplies: booleanFromText.default(false),
  finalStatus: booleanFromText.default(false)
});

export type CliRequest = { help: true } | { help: false; config: MonitorConfig };

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || !value.trim() ? undefined : value;
}

export function readEnvConfig(env: NodeJS.ProcessEnv): Partial<Record<keyof MonitorConfig, string>> {
  const raw: Partial<Record<keyof MonitorConfig, string>> = {};
  for (const [key, envName] of ENV_KEYS) {
    const value = blankToUndefined(env[envName]);
    if (value !== undefined) {
      raw[key] = value;
    }
  }
  return raw;
}

function resolveConfig(raw: Record<string, unknown>): MonitorConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return result.data;
}

/** Flags override environment variables, which override the defaults. */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): CliRequest {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    throw new ConfigError([err instanceof Error ? err.message : String(err)]);
  }

  const { values, positionals } = parsed;
  if (values.help) {
    return { help: true };
  }
  if (positionals.length > 0) {
    throw new ConfigError([`unexpected argument: ${positionals.join(' ')}`]);
  }

  const blankFlags = Object.entries(values)
    .filter(([, value]) => typeof value === 'string' && !value.trim())
    .map(([name]) => `--${name}: must not be empty`);
  if (blankFlags.length > 0) {
    throw new ConfigError(blankFlags);
  }

  const fromFlags: Record<string, unknown> = {};
  if (values['max-time-ms'] !== undefined) fromFlags.maxRoundtripMillis = values['max-time-ms'];
  if (values.fmt !== undefined) fromFlags.timestampFormat = values.fmt;
  if (values['heartbeat-interval'] !== undefined) {
    fromFlags.heartbeatIntervalSeconds = values['heartbeat-interval'];
  }
  if (values['allowed-seq-diff'] !== undefined) fromFlags.allowedSequenceGap = values['allowed-seq-diff'];
  if (values['timestamp-source'] !== undefined) fromFlags.timestampSource = values['timestamp-source'];
  if (values['forward-flagged'] !== undefined) fromFlags.forwardFlaggedReplies = values['forward-flagged'];
  if (values['final-status'] !== undefined) fromFlags.finalStatus = values['final-status'];

  return { help: false, config: resolveConfig({ ...readEnvConfig(env), ...fromFlags }) };
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      'max-time-ms': { type: 'string', short: 't' },
      fmt: { type: 'string' },
      'heartbeat-interval': { type: 'string' },
      'allowed-seq-diff': { type: 'string' },
      'timestamp-source': { type: 'string' },
      'forward-flagged': { type: 'boolean' },
      'final-status': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' }
    }
  });
}
