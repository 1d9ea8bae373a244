import { z } from 'zod';
import { option, positional, requireOption } from '../args.js';
import { formatDetails } from '../output.js';
import { invitationSchema, userSchema } from '../schemas.js';
import { printTable, type CommandGroup } from '../command.js';

export const invitationCommands: CommandGroup = {
  summary: 'Invite people to sign up',
  subcommands: {
    create: {
      usage: 'invite create --email <email> --role admin|coach|swimmer|fan [--team <team-id>]',
      async run(ctx, args) {
        const invitation = await ctx.client.post('/api/v1/auth/invitations', invitationSchema, {
          email: requireOption(args, 'email'),
          role: requireOption(args, 'role'),
          team_id: option(args, 'team'),
        });
        ctx.out(
          formatDetails([
            ['Invitation', invitation.id],
            ['Email', invitation.email],
            ['Role', invitation.role],
            ['Token', invitation.token],
            ['Expires', invitation.expires_at],
          ]),
        );
      },
    },
    list: {
      usage: 'invite list [--status pending|accepted|expired|revoked]',
      async run(ctx, args) {
        const invitations = await ctx.client.get('/api/v1/auth/invitations', z.array(invitationSchema), {
          status: option(args, 'status'),
        });
        printTable(
          ctx,
          ['ID', 'Email', 'Role', 'Status', 'Expires'],
          invitations.map((invitation) => [
            invitation.id,
            invitation.email,
            invitation.role,
            invitation.status,
            invitation.expires_at,
          ]),
        );
      },
    },
    revoke: {
      usage: 'invite revoke <invitation-id>',
      async run(ctx, args) {
        const id = positional(args, 0, 'invitation-id');
        const invitation = await ctx.client.request('DELETE', `/api/v1/auth/invitations/${encodeURIComponent(id)}`, {
          schema: invitationSchema,
        });
        ctx.out(`Revoked invitation for ${invitation.email}`);
      },
    },
  },
};

export const userCommands: CommandGroup = {
  summary: 'Manage accounts (admin)',
  subcommands: {
    list: {
      usage: 'users list',
      async run(ctx) {
        const users = await ctx.client.get('/api/v1/auth/users', z.array(userSchema));
        printTable(
          ctx,
          ['ID', 'Email', 'Name', 'Role', 'Active'],
          users.map((user) => [user.id, user.email, user.displayName, user.role, user.active]),
        );
      },
    },
    'set-role': {
      usage: 'users set-role <user-id> admin|coach|swimmer|fan',
      async run(ctx, args) {
        const userId = positional(args, 0, 'user-id');
        const user = await ctx.client.patch(`/api/v1/auth/users/${encodeURIComponent(userId)}/role`, userSchema, {
          role: positional(args, 1, 'role'),
        });
        ctx.out(`${user.email} is now ${user.role}`);
      },
    },
  },
};
