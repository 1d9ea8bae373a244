import { z } from 'zod';
import { intOption, option, pickOptions, positional, requireOption, type ParsedArgs } from '../args.js';
import { formatDetails } from '../output.js';
import { resolveTeam } from '../resolve.js';
import { teamSchema } from '../schemas.js';
import { printTable, type CommandGroup } from '../command.js';

const LOCATION_OPTIONS = ['lsc', 'division', 'state', 'country'] as const;

function teamFields(args: ParsedArgs) {
  return {
    ...pickOptions(args, ['name', ...LOCATION_OPTIONS]),
    ...(option(args, 'type') === undefined ? {} : { team_type: option(args, 'type') }),
    ...(option(args, 'body') === undefined ? {} : { sanctioning_body: option(args, 'body') }),
  };
}

export const teamCommands: CommandGroup = {
  summary: 'Clubs, schools and national teams',
  subcommands: {
    list: {
      usage: 'teams list [--name <text>] [--type <team_type>] [--body <body>] [--lsc|--division|--state|--country <value>] [--limit <n>]',
      async run(ctx, args) {
        const teams = await ctx.client.get('/api/v1/teams', z.array(teamSchema), {
          ...pickOptions(args, ['name', ...LOCATION_OPTIONS]),
          team_type: option(args, 'type'),
          sanctioning_body: option(args, 'body'),
          limit: intOption(args, 'limit'),
        });
        printTable(
          ctx,
          ['ID', 'Name', 'Type', 'Body', 'LSC / Division / State'],
          teams.map((team) => [team.id, team.name, team.team_type, team.sanctioning_body, team.lsc ?? team.division ?? team.state]),
        );
      },
    },
    get: {
      usage: 'teams get <team>',
      async run(ctx, args) {
        const team = await resolveTeam(ctx.client, positional(args, 0, 'team'));
        ctx.out(
          formatDetails([
            ['ID', team.id],
            ['Name', team.name],
            ['Type', team.team_type],
            ['Body', team.sanctioning_body],
            ['LSC', team.lsc],
            ['Division', team.division],
            ['State', team.state],
            ['Country', team.country],
          ]),
        );
      },
    },
    create: {
      usage: 'teams create --name <name> --type <team_type> --body <body> [--lsc|--division|--state|--country <value>]',
      async run(ctx, args) {
        requireOption(args, 'name');
        requireOption(args, 'type');
        requireOption(args, 'body');
        const team = await ctx.client.post('/api/v1/teams', teamSchema, teamFields(args));
        ctx.out(`Created team ${team.name} (${team.id})`);
      },
    },
    update: {
      usage: 'teams update <team> [--name|--type|--body|--lsc|--division|--state|--country <value>]',
      async run(ctx, args) {
        const existing = await resolveTeam(ctx.client, positional(args, 0, 'team'));
        const team = await ctx.client.patch(`/api/v1/teams/${existing.id}`, teamSchema, teamFields(args));
        ctx.out(`Updated team ${team.name} (${team.id})`);
      },
    },
    delete: {
      usage: 'teams delete <team>',
      async run(ctx, args) {
        const team = await resolveTeam(ctx.client, positional(args, 0, 'team'));
        await ctx.client.delete(`/api/v1/teams/${team.id}`);
        ctx.out(`Deleted team ${team.name}`);
      },
    },
  },
};
