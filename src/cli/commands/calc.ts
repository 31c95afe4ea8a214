import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Command, CommandContext } from './index.js';
import { registerCommand } from './index.js';
import { errorMessage } from '../../errors.js';
import { getLogger } from '../../observability/logger.js';
import { buildScoreReport } from '../../pipeline.js';
import { parseRawCounts } from '../../scoring/input.js';

const calcCommand: Command = {
  name: 'calc',
  usage: 'calc <counts.json> [--min-contributions N] [--skip-invalid]',
  description: 'Score raw category counts read from a JSON file',
  async run(ctx: CommandContext): Promise<number> {
    const logger = getLogger();
    const file = ctx.args.positionals[0];

    if (!file) {
      ctx.output.error('Usage: reposcore calc <counts.json>');
      return 1;
    }

    const filePath = path.resolve(ctx.cwd, file);

    try {
      const document: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
      const rawByUser = parseRawCounts(document);
      logger.debug('Read raw counts', { path: filePath, users: rawByUser.size });

      ctx.output.json(buildScoreReport(rawByUser, ctx.config));
      return 0;
    } catch (error) {
      logger.error('Calc command failed', { path: filePath, error: errorMessage(error) });
      ctx.output.error(`Failed to score ${file}: ${errorMessage(error)}`);
      return 1;
    }
  },
};

registerCommand(calcCommand);

export default calcCommand;
