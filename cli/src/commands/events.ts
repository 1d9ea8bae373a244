import { UsageError } from '../args.js';
import { formatDetails } from '../output.js';
import { resolveEvent } from '../resolve.js';
import type { CommandGroup } from '../command.js';

export const eventCommands: CommandGroup = {
  summary: 'Look up events',
  subcommands: {
    lookup: {
      usage: 'events lookup <description>   e.g. events lookup 100 free scy',
      async run(ctx, args) {
        const description = args.positionals.join(' ').trim();
        if (!description) {
          throw new UsageError('Missing <description>');
        }
        const event = await resolveEvent(ctx.client, description);
        ctx.out(
          formatDetails([
            ['ID', event.id],
            ['Event', event.label],
            ['Stroke', event.stroke],
            ['Distance', event.distance],
            ['Course', event.course],
          ]),
        );
      },
    },
  },
};
