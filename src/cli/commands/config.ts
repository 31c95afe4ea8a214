import type { Command, CommandContext } from './index.js';
import { registerCommand } from './index.js';

const configCommand: Command = {
  name: 'config',
  usage: 'config',
  description: 'Print the resolved configuration',
  async run(ctx: CommandContext): Promise<number> {
    ctx.output.json({
      ...ctx.config,
      token: ctx.config.token ? '***' : null,
      semesterStart: ctx.config.semesterStart ?? null,
    });
    return 0;
  },
};

registerCommand(configCommand);

export default configCommand;
