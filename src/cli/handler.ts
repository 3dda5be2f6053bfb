import { z } from 'zod';
import ora from 'ora';
import { loadConfigFromEnv } from '../config.js';
import { ContentFormats, OptionNumbers } from '../constants.js';
import { CoapClient } from '../core/client.js';
import { ValidationError, asError } from '../core/errors.js';
import { codeToString, decodeUint, type Response } from '../core/message.js';
import { ConsoleLogger, setLogger } from '../utils/logger.js';
import colors from '../utils/colors.js';

export const OPERATIONS = ['GET', 'PUT', 'POST', 'DELETE', 'DISCOVER', 'OBSERVE'] as const;

export type Operation = (typeof OPERATIONS)[number];

/**
 * Options as commander hands them over
 */
export interface RawCliOptions {
  operation?: string;
  resource?: string;
  payload?: string;
  non?: boolean;
  timeout?: string | number;
  debug?: boolean;
}

const cliOptionsSchema = z
  .object({
    operation: z
      .string()
      .default('DISCOVER')
      .transform((value) => value.toUpperCase())
      .pipe(z.enum(OPERATIONS)),
    resource: z
      .string()
      .refine((value) => value.startsWith('/'), 'Resource must start with "/"')
      .optional(),
    payload: z.string().optional(),
    non: z.boolean().default(false),
    timeout: z.coerce.number().positive('Timeout must be a positive number of seconds').default(30),
    debug: z.boolean().default(false),
  })
  .superRefine((options, ctx) => {
    if (options.operation !== 'DISCOVER' && options.resource === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['resource'],
        message: `Operation ${options.operation} needs a resource (-r)`,
      });
    }
    if ((options.operation === 'PUT' || options.operation === 'POST') && options.payload === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['payload'],
        message: `Operation ${options.operation} needs a payload (-p)`,
      });
    }
  });

export type CliOptions = z.output<typeof cliOptionsSchema>;

export function validateCliOptions(raw: RawCliOptions): CliOptions {
  const result = cliOptionsSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new ValidationError(issue.message, { field, value: field ? readField(raw, field) : undefined });
  }
  return result.data;
}

export interface ResponseSummary {
  /** e.g. "2.05" */
  status: string;
  success: boolean;
  /** Payload split into display lines */
  lines: string[];
  /** Observe sequence number when present */
  sequence?: number;
}

/**
 * Plain-text view of a response. Link-format bodies get one link per line.
 */
export function summarizeResponse(response: Response): ResponseSummary {
  const format = response.getOption(OptionNumbers.CONTENT_FORMAT);
  const isLinkFormat = format !== undefined && decodeUint(format.value) === ContentFormats.LINK_FORMAT;
  const text = response.text;

  let lines: string[];
  if (text.length === 0) {
    lines = [];
  } else if (isLinkFormat) {
    lines = text.split(',').filter((link) => link.length > 0);
  } else {
    lines = text.split('\n');
  }

  return {
    status: codeToString(response.code),
    success: response.isSuccess,
    lines,
    sequence: response.observe,
  };
}

function printResponse(response: Response): void {
  const summary = summarizeResponse(response);
  const status = summary.success ? colors.green(summary.status) : colors.red(summary.status);
  const sequence = summary.sequence === undefined ? '' : colors.gray(` (observe ${summary.sequence})`);
  console.log(`${colors.bold(status)}${sequence}`);
  for (const line of summary.lines) {
    console.log(line);
  }
}

/**
 * Run one CLI invocation against `target`
 */
export async function handleCommand(target: string, raw: RawCliOptions): Promise<void> {
  const options = validateCliOptions(raw);
  const logger = new ConsoleLogger({ level: options.debug ? 'debug' : 'warn' });
  setLogger(logger);

  const timeoutMs = options.timeout * 1000;
  const client = CoapClient.connect(target, {
    ...loadConfigFromEnv(),
    logger,
    responseTimeout: options.operation === 'OBSERVE' ? undefined : timeoutMs,
  });
  const type = options.non ? 'NON' : 'CON';
  const resource = options.resource ?? '/';

  const spinner = options.debug
    ? null
    : ora({
        text: `${colors.bold(options.operation)} ${colors.cyan(target + (options.resource ?? ''))}`,
        color: 'cyan',
        spinner: 'dots',
      }).start();

  try {
    await client.open();

    switch (options.operation) {
      case 'GET':
        printResponse(await withSpinnerStop(spinner, client.get(resource, { type })));
        break;
      case 'PUT':
        printResponse(await withSpinnerStop(spinner, client.put(resource, options.payload ?? '', { type })));
        break;
      case 'POST':
        printResponse(await withSpinnerStop(spinner, client.post(resource, options.payload ?? '', { type })));
        break;
      case 'DELETE':
        printResponse(await withSpinnerStop(spinner, client.delete(resource, { type })));
        break;
      case 'DISCOVER':
        printResponse(await withSpinnerStop(spinner, client.discover({ type })));
        break;
      case 'OBSERVE':
        await observeFor(client, resource, timeoutMs, spinner);
        break;
    }
  } finally {
    spinner?.stop();
    await client.close();
  }
}

async function withSpinnerStop<T>(spinner: { stop(): unknown } | null, pending: Promise<T>): Promise<T> {
  try {
    return await pending;
  } finally {
    spinner?.stop();
  }
}

/**
 * Print notifications until `durationMs` passes or SIGINT arrives
 */
async function observeFor(
  client: CoapClient,
  resource: string,
  durationMs: number,
  spinner: { stop(): unknown } | null
): Promise<void> {
  const observation = await withSpinnerStop(spinner, client.observe(resource, printResponse));
  if (!observation.active) {
    console.log(colors.yellow('Server did not accept the observation'));
    return;
  }

  await new Promise<void>((resolve) => {
    const finish = () => {
      clearTimeout(timer);
      process.off('SIGINT', finish);
      resolve();
    };
    const timer = setTimeout(finish, durationMs);
    process.once('SIGINT', finish);
  });

  try {
    await observation.cancel();
  } catch (error) {
    console.error(colors.yellow(`Could not deregister: ${asError(error).message}`));
  }
}

function readField(raw: RawCliOptions, field: string): unknown {
  switch (field) {
    case 'operation':
      return raw.operation;
    case 'resource':
      return raw.resource;
    case 'payload':
      return raw.payload;
    case 'timeout':
      return raw.timeout;
    default:
      return undefined;
  }
}
