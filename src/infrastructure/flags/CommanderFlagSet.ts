import { Command, InvalidArgumentError } from 'commander';
import type { OptionValues } from 'commander';
import type { FlagParser } from '../../domain/ports/Generator.js';

function parseNonNegativeInteger(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Must be a safe integer.');
  }
  return parsed;
}

/**
 * Generator flag schema backed by a commander `Command`.
 *
 * Flags are declared with `integer()` / `string()` and applied with `parse()`.
 * Parse failures throw commander's `CommanderError` instead of exiting the
 * process, and nothing is written to stdout or stderr. Option names are
 * camel-cased in `values()` (`--payload-bytes` becomes `payloadBytes`).
 */
export class CommanderFlagSet<T extends OptionValues> implements FlagParser {
  private readonly command: Command;

  constructor(name: string) {
    this.command = new Command(name)
      .exitOverride()
      .helpOption(false)
      .configureOutput({
        writeOut: () => undefined,
        writeErr: () => undefined,
        outputError: () => undefined,
      });
  }

  integer(flag: string, description: string, defaultValue: number): this {
    this.command.option(`--${flag} <n>`, description, parseNonNegativeInteger, defaultValue);
    return this;
  }

  string(flag: string, description: string, defaultValue: string): this {
    this.command.option(`--${flag} <value>`, description, defaultValue);
    return this;
  }

  parse(args: readonly string[]): void {
    this.command.parse([...args], { from: 'user' });
  }

  values(): T {
    return this.command.opts<T>();
  }
}
