import { ApiError, credentialsFromSession } from '../client.js';
import { hasFlag, option } from '../args.js';
import { formatDetails } from '../output.js';
import { sessionSchema, successSchema, userSchema } from '../schemas.js';
import type { CommandGroup } from '../command.js';

export const authCommands: CommandGroup = {
  summary: 'Sign in and out',
  subcommands: {
    login: {
      usage: 'auth login [--email <email>] [--password <password>] [--device <name>]',
      async run(ctx, args) {
        const email = option(args, 'email') ?? (await ctx.prompt('Email: ')).trim();
        const password = option(args, 'password') ?? (await ctx.prompt('Password: '));

        const session = await ctx.client.request('POST', '/api/v1/auth/login', {
          schema: sessionSchema,
          body: { email, password, device_name: option(args, 'device') ?? 'swimcuts-cli' },
          auth: false,
        });
        await ctx.credentials.save(credentialsFromSession(session));
        ctx.out(`Logged in as ${session.user.email} (${session.user.role})`);
      },
    },
    logout: {
      usage: 'auth logout [--all]',
      async run(ctx, args) {
        const stored = await ctx.credentials.load();
        if (!stored) {
          ctx.out('Not logged in.');
          return;
        }
        try {
          await ctx.client.post('/api/v1/auth/logout', successSchema, { all_devices: hasFlag(args, 'all') });
        } catch (error) {
          if (!(error instanceof ApiError)) throw error;
          ctx.err(`Server logout failed: ${error.message}`);
        }
        await ctx.credentials.clear();
        ctx.out('Logged out.');
      },
    },
    status: {
      usage: 'auth status',
      async run(ctx) {
        const stored = await ctx.credentials.load();
        ctx.out(stored ? `Logged in as ${stored.email} (${stored.role})` : 'Not logged in.');
      },
    },
    whoami: {
      usage: 'auth whoami',
      async run(ctx) {
        const user = await ctx.client.get('/api/v1/auth/me', userSchema);
        ctx.out(
          formatDetails([
            ['ID', user.id],
            ['Email', user.email],
            ['Name', user.displayName],
            ['Role', user.role],
            ['Swimmer', user.swimmerId],
            ['Active', user.active],
          ]),
        );
      },
    },
  },
};
