#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { program } from 'commander';
import { CoapError, asError } from '../core/errors.js';
import colors from '../utils/colors.js';
import { OPERATIONS, handleCommand, type RawCliOptions } from './handler.js';

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    return '0.0.0';
  }
  return '0.0.0';
}

/**
 * CLI Entry Point
 */
async function main() {
  program
    .name('coaplink')
    .description('Reliable CoAP requests over UDP or a SLIP serial bridge')
    .version(readVersion())
    .argument('<target>', 'udp://host[:port] or tcp://host:port (SLIP bridge)')
    .option('-o, --operation <op>', `One of ${OPERATIONS.join(', ')}`, 'DISCOVER')
    .option('-r, --resource <path>', 'Resource path, e.g. /sensors/temp')
    .option('-p, --payload <text>', 'Request payload (PUT and POST)')
    .option('--non', 'Send non-confirmable (no retransmission)')
    .option('-t, --timeout <seconds>', 'Response timeout, or observe duration', '30')
    .option('-d, --debug', 'Log every datagram and retransmission')
    .addHelpText('after', `
${colors.bold(colors.yellow('Examples:'))}
  ${colors.green('$ coaplink udp://[fd00::7]:5683')}
  ${colors.green('$ coaplink udp://10.0.0.7 -o GET -r /sensors/temp')}
  ${colors.green('$ coaplink udp://10.0.0.7 -o PUT -r /actuators/led -p on')}
  ${colors.green('$ coaplink tcp://gateway.local:7000 -o OBSERVE -r /sensors/temp -t 60')}

${colors.bold(colors.yellow('Environment:'))}
  ${colors.cyan('COAPLINK_ACK_TIMEOUT')}        initial ACK timeout in ms (default 2000)
  ${colors.cyan('COAPLINK_ACK_RANDOM_FACTOR')}  backoff randomisation (default 1.5)
  ${colors.cyan('COAPLINK_MAX_RETRANSMIT')}     retransmissions before giving up (default 4)
  ${colors.cyan('COAPLINK_POLL_INTERVAL')}      receiver poll interval in ms (default 100)
`)
    .action(async (target: string, options: RawCliOptions) => {
      try {
        await handleCommand(target, options);
      } catch (error) {
        const err = asError(error);
        console.error(colors.red(`\nError: ${err.message}`));
        if (err instanceof CoapError) {
          for (const suggestion of err.suggestions) {
            console.error(colors.gray(`  • ${suggestion}`));
          }
        }
        process.exitCode = 1;
      }
    });

  await program.parseAsync();
}

// Run the CLI
main().catch((error: unknown) => {
  console.error('CLI Error:', asError(error).message);
  process.exit(1);
});
