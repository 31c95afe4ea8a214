import type { Command, CommandContext } from './index.js';
import { registerCommand } from './index.js';
import { errorMessage } from '../../errors.js';
import { GitHubClient, OctokitTransport, parseRepoSlug, type GitHubTransport } from '../../github/client.js';
import { getLogger } from '../../observability/logger.js';
import { scoreRepository, type RepositoryReport } from '../../pipeline.js';
import { booleanFlag } from '../flags.js';

export type TransportFactory = (token: string | undefined) => GitHubTransport;

const defaultTransport: TransportFactory = token => new OctokitTransport({ token });

export function createScoreCommand(makeTransport: TransportFactory = defaultTransport): Command {
  return {
    name: 'score',
    usage: 'score <owner/repo>... [--token T] [--exclude USER] [--min-contributions N] [--semester-start YYYY-MM-DD] [--time-zone TZ] [--skip-invalid] [--dry-run]',
    description: 'Fetch, score and rank contributors of one or more repositories',
    async run(ctx: CommandContext): Promise<number> {
      const logger = getLogger();

      if (ctx.args.positionals.length === 0) {
        ctx.output.error('Usage: reposcore score <owner/repo>...');
        return 1;
      }

      try {
        const dryRun = booleanFlag(ctx.args.flags, 'dry-run') ?? false;
        const slugs = ctx.args.positionals.map(parseRepoSlug);
        const client = new GitHubClient(makeTransport(ctx.config.token));

        if (!ctx.config.token) {
          logger.warn('No GitHub token configured; unauthenticated requests are heavily rate limited');
        }

        // One repository at a time; each report stands on its own
        const repositories: RepositoryReport[] = [];
        for (const slug of slugs) {
          repositories.push(await scoreRepository(client, slug, ctx.config, { dryRun }));
        }

        ctx.output.json({ repositories });
        return 0;
      } catch (error) {
        logger.error('Score command failed', { error: errorMessage(error) });
        ctx.output.error(errorMessage(error));
        return 1;
      }
    },
  };
}

const scoreCommand = createScoreCommand();

registerCommand(scoreCommand);

export default scoreCommand;
