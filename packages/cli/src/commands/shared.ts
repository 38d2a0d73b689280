import chalk from 'chalk';
import { createRuntime, type Runtime } from '@fusekit/core';

/** Print an error and exit. Actions call this instead of throwing past commander. */
export function fail(message: string, detail?: string): never {
  // eslint-disable-next-line no-console
  console.error(detail === undefined ? chalk.red(message) : `${chalk.red(message)} ${detail}`);
  process.exit(1);
}

/** `undefined` passes through; anything that is not a whole number above zero is `null`. */
export function parsePositiveInt(value: string | undefined): number | undefined | null {
  if (value === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(value.trim())) {
    return null;
  }
  const parsed = parseInt(value, 10);
  return parsed >= 1 ? parsed : null;
}

export function requirePositiveInt(value: string | undefined, flag: string): number | undefined {
  const parsed = parsePositiveInt(value);
  if (parsed === null) {
    fail(`Invalid ${flag} value. Must be a positive integer.`);
  }
  return parsed;
}

/** Collapse whitespace and cut to `maxLength` characters. */
export function preview(text: string, maxLength = 80): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > maxLength ? `${flat.slice(0, maxLength - 3)}...` : flat;
}

export async function openRuntime(rootDir: string): Promise<Runtime> {
  const result = await createRuntime({ rootDir });
  if (result.isErr()) {
    fail('Could not start fusekit:', result.error.message);
  }
  return result.value;
}
