/**
 * Command Runner
 *
 * Runs catalog command text through the processor the adapter picks for
 * its verb. Failures are reported together with everything the catalog
 * printed into the context's output buffer.
 *
 * @packageDocumentation
 */

import type { CatalogAdapter } from '../adapters/types.js';
import type { ExecutionContext } from '../context/execution-context.js';
import type { CatalogSession } from '../context/session-scope.js';
import { CatalogError, InvalidArgumentError, QueryExecutionError } from '../errors.js';
import type { StructuredLogger } from '../logging/index.js';
import type { NativeDriver } from '../native.js';

const FAILURE_BANNER = [
  '',
  '======================',
  'CATALOG FAILURE OUTPUT',
  '======================',
  '{output}',
  '======================',
  'END CATALOG FAILURE OUTPUT',
  '======================',
].join('\n');

/**
 * A command split into its verb and the text after it.
 */
export interface ParsedCommand {
  /** Full command text, trimmed */
  text: string;
  verb: string;
  /** Text after the verb, trimmed */
  args: string;
}

export function parseCommand(text: string): ParsedCommand {
  const trimmed = text.trim();
  const verb = trimmed.split(/\s+/, 1)[0] ?? '';
  return { text: trimmed, verb, args: trimmed.slice(verb.length).trim() };
}

function parseAssignment(args: string): [string, string] | undefined {
  const eq = args.indexOf('=');
  if (eq <= 0) {
    return undefined;
  }
  return [args.slice(0, eq).trim(), args.slice(eq + 1).trim()];
}

function databaseOfUse(args: string): string | undefined {
  const name = args.split(/\s+/, 1)[0]?.replace(/;$/, '').replace(/^`(.*)`$/, '$1');
  return name === undefined || name === '' ? undefined : name;
}

export class CommandRunner {
  constructor(
    private readonly adapter: CatalogAdapter,
    private readonly logger: StructuredLogger
  ) {}

  /**
   * Runs a command and returns at most `maxRows` result rows.
   *
   * @throws {QueryExecutionError} When a driver reports a non-zero response code
   */
  async run(session: CatalogSession, text: string, maxRows: number): Promise<string[]> {
    if (!Number.isInteger(maxRows) || maxRows <= 0) {
      throw new InvalidArgumentError(`maxRows must be a positive integer, got ${maxRows}`);
    }
    const command = parseCommand(text);
    if (command.verb === '') {
      throw new InvalidArgumentError('Command must not be empty');
    }
    const { context, connection } = session;
    const verb = command.verb.toLowerCase();

    this.logger.debug('Running catalog command: {command}', { command: command.text });

    try {
      const processor = await this.adapter.getCommandProcessor(verb, context.configEntries(), connection);

      if (processor.kind === 'driver') {
        const rows = await this.runDriver(context, processor.driver, command.text, maxRows);
        if (verb === 'use') {
          const database = databaseOfUse(command.args);
          if (database !== undefined) {
            context.setCurrentDatabase(database);
          }
        }
        return rows;
      }

      if (verb === 'set') {
        this.logger.info('Changing config: {change}', { change: command.args });
      }
      context.print(`${command.verb} ${command.args}`);
      const response = await processor.run(command.args);
      context.relay(response);
      if (verb === 'set' && response.responseCode === 0) {
        const assignment = parseAssignment(command.args);
        if (assignment) {
          context.setConfigValue(assignment[0], assignment[1]);
        }
      }
      return [String(response.responseCode)];
    } catch (error) {
      const output = context.outputBuffer.toString();
      this.logger.error(FAILURE_BANNER, error, { output, command: command.text });
      if (error instanceof CatalogError) {
        error.withDiagnostics(output);
      }
      throw error;
    }
  }

  private async runDriver(
    context: ExecutionContext,
    driver: NativeDriver,
    text: string,
    maxRows: number
  ): Promise<string[]> {
    try {
      const response = await driver.run(text);
      context.relay(response);
      if (response.responseCode !== 0) {
        const message = response.errorMessage ?? `Command failed with response code ${response.responseCode}`;
        context.printError(message);
        throw new QueryExecutionError(message, response.responseCode, response.sqlState ?? undefined);
      }
      await driver.setMaxRows(maxRows);
      const rows = await this.adapter.getCommandResults(driver);
      return rows.slice(0, maxRows);
    } finally {
      await driver.close();
    }
  }
}
