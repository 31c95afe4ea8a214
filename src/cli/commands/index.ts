import type { ReposcoreConfig } from '../../config/schema.js';
import type { ParsedArgs } from '../parser.js';
import type { Output } from '../output.js';

export interface CommandContext {
  args: ParsedArgs;
  output: Output;
  config: ReposcoreConfig;
  cwd: string;
}

export interface Command {
  name: string;
  usage: string;
  description: string;
  run(ctx: CommandContext): Promise<number>;
}

export const commands: Map<string, Command> = new Map();

export function registerCommand(cmd: Command): void {
  commands.set(cmd.name, cmd);
}

export function getCommand(name: string): Command | undefined {
  return commands.get(name);
}
