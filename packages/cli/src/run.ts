/**
 * Command dispatch for the `rowbridge` CLI
 *
 * Usage:
 *   rowbridge schema <table-schema.json> [--config <config.json>]
 *   rowbridge table-schema <schema.json> [--config <config.json>]
 *   rowbridge fingerprint <table-schema.json> [--config <config.json>]
 *   rowbridge avro-schema <table-schema.json> [--name <name>] [--namespace <ns>] [--config <config.json>]
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ZodError } from 'zod';
import { ConversionError, parseSchemaDefinition, toSchemaDefinition } from '@rowbridge/core';
import { parseTableSchema } from '@rowbridge/connector-bigquery';
import { ConfigError, formatZodError, parseConfig, resolveOptions, type ConfigFile } from './config.js';
import { createConverter } from './converter.js';
import { instrumentConverter } from './instrument-converter.js';
import { Logger, createRunId } from './logger.js';

export type CliIo = {
  readFile: (path: string) => Promise<string>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env?: NodeJS.ProcessEnv;
};

const defaultIo: CliIo = {
  readFile: (path) => readFile(resolve(process.cwd(), path), 'utf-8'),
  stdout: (text) => {
    process.stdout.write(`${text}\n`);
  },
  stderr: (text) => {
    process.stderr.write(`${text}\n`);
  },
};

export const USAGE = [
  'Usage: rowbridge <command> <file> [--config <config.json>]',
  '',
  'Commands:',
  '  schema <table-schema.json>        Print the canonical schema of a BigQuery table schema',
  '  table-schema <schema.json>        Print the BigQuery table schema of a canonical schema',
  '  fingerprint <table-schema.json>   Print the storage write fingerprint of a table schema',
  '  avro-schema <table-schema.json>   Print the Avro export schema (--name, --namespace)',
].join('\n');

/** Remove `--name value` from args and return the value */
function takeOption(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) return undefined;
  const [, value] = args.splice(index, 2);
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError(`Option ${name} requires a value`);
  }
  return value;
}

async function readJson(io: CliIo, path: string): Promise<unknown> {
  const content = (await io.readFile(path)).replace(/^\uFEFF/, '');
  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`${path} is not valid JSON: ${reason}`);
  }
}

/**
 * Run one CLI command and return the process exit code. Command output goes
 * to `io.stdout`; logs and errors go to `io.stderr`.
 */
export async function runCli(argv: readonly string[], io: CliIo = defaultIo): Promise<number> {
  const args = [...argv];
  let logger = new Logger({ write: io.stderr });

  if (args.includes('--help') || args.includes('-h')) {
    io.stdout(USAGE);
    return 0;
  }

  try {
    const configPath = takeOption(args, '--config');
    const name = takeOption(args, '--name') ?? 'root';
    const namespace = takeOption(args, '--namespace');
    const [command, input] = args;
    if (!command || !input) {
      io.stderr(USAGE);
      return 1;
    }

    let config: ConfigFile = {};
    if (configPath) {
      config = parseConfig(await readJson(io, configPath), { env: io.env });
    }
    logger = new Logger({
      level: config.logging?.level,
      format: config.logging?.format,
      write: io.stderr,
    }).child({ runId: createRunId(), command });

    const converter = instrumentConverter(createConverter(resolveOptions(config)), logger);

    switch (command) {
      case 'schema': {
        const tableSchema = parseTableSchema(await readJson(io, input));
        const schema = converter.fromTableSchema(tableSchema);
        io.stdout(JSON.stringify(toSchemaDefinition(schema), null, 2));
        return 0;
      }
      case 'table-schema': {
        const schema = parseSchemaDefinition(await readJson(io, input));
        io.stdout(JSON.stringify(converter.toTableSchema(schema), null, 2));
        return 0;
      }
      case 'fingerprint': {
        const tableSchema = parseTableSchema(await readJson(io, input));
        io.stdout(converter.fingerprint(tableSchema).toString());
        return 0;
      }
      case 'avro-schema': {
        const tableSchema = parseTableSchema(await readJson(io, input));
        io.stdout(JSON.stringify(converter.toAvroSchema(name, tableSchema, namespace), null, 2));
        return 0;
      }
      default:
        io.stderr(`Unknown command: ${command}`);
        io.stderr(USAGE);
        return 1;
    }
  } catch (error) {
    if (error instanceof ConversionError) {
      io.stderr(error.toActionableMessage());
    } else if (error instanceof ZodError) {
      io.stderr(formatZodError(error, 'Invalid schema'));
    } else if (error instanceof ConfigError) {
      io.stderr(error.message);
    } else {
      logger.error('Command failed', { error });
    }
    return 1;
  }
}
