import { z } from 'zod';
import { UsageError, hasFlag, positional } from '../args.js';
import { followSchema, messageSchema } from '../schemas.js';
import { printTable, type CommandGroup, type CommandHandler } from '../command.js';

function listFollows(path: string): CommandHandler {
  return async (ctx) => {
    const follows = await ctx.client.get(`/api/v1/follows/${path}`, z.array(followSchema));
    printTable(
      ctx,
      ['ID', 'Fan', 'Swimmer', 'Status', 'Initiated by'],
      follows.map((follow) => [follow.id, follow.fan_id, follow.swimmer_id, follow.status, follow.initiated_by]),
    );
  };
}

export const followCommands: CommandGroup = {
  summary: 'Fans following swimmers',
  subcommands: {
    request: {
      usage: 'follows request <swimmer-user-id>',
      async run(ctx, args) {
        const follow = await ctx.client.post('/api/v1/follows/request', followSchema, {
          swimmer_id: positional(args, 0, 'swimmer-user-id'),
        });
        ctx.out(`Follow request sent (${follow.id})`);
      },
    },
    invite: {
      usage: 'follows invite <fan-user-id>',
      async run(ctx, args) {
        const follow = await ctx.client.post('/api/v1/follows/invite', followSchema, {
          fan_id: positional(args, 0, 'fan-user-id'),
        });
        ctx.out(`Invite sent (${follow.id})`);
      },
    },
    following: {
      usage: 'follows following',
      run: listFollows('following'),
    },
    followers: {
      usage: 'follows followers',
      run: listFollows('followers'),
    },
    requests: {
      usage: 'follows requests',
      run: listFollows('requests'),
    },
    respond: {
      usage: 'follows respond <follow-id> --approve|--deny',
      async run(ctx, args) {
        const id = positional(args, 0, 'follow-id');
        const approve = hasFlag(args, 'approve');
        if (approve === hasFlag(args, 'deny')) {
          throw new UsageError('Pass exactly one of --approve or --deny');
        }
        const follow = await ctx.client.post(`/api/v1/follows/${encodeURIComponent(id)}/respond`, followSchema, {
          approved: approve,
        });
        ctx.out(`Follow ${follow.id} ${follow.status}`);
      },
    },
    remove: {
      usage: 'follows remove <follow-id>',
      async run(ctx, args) {
        const id = positional(args, 0, 'follow-id');
        const result = await ctx.client.request('DELETE', `/api/v1/follows/${encodeURIComponent(id)}`, {
          schema: messageSchema,
        });
        ctx.out(result.message);
      },
    },
  },
};
