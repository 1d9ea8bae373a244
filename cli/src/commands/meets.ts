import { z } from 'zod';
import { hasFlag, intOption, option, pickOptions, positional, requireOption, type ParsedArgs } from '../args.js';
import { formatDetails } from '../output.js';
import { resolveMeet, resolveTeam } from '../resolve.js';
import { meetSchema, meetTeamSchema } from '../schemas.js';
import { printTable, type CommandGroup } from '../command.js';

function meetFields(args: ParsedArgs) {
  const fields: Record<string, string | number | boolean | undefined> = {
    ...pickOptions(args, ['name', 'location', 'city', 'state', 'country', 'start-date', 'end-date', 'course']),
    lanes: intOption(args, 'lanes'),
    sanctioning_body: option(args, 'body'),
    meet_type: option(args, 'type'),
  };
  if (hasFlag(args, 'outdoor')) fields.indoor = false;
  if (hasFlag(args, 'indoor')) fields.indoor = true;
  return fields;
}

export const meetCommands: CommandGroup = {
  summary: 'Meets and the teams attending them',
  subcommands: {
    list: {
      usage: 'meets list [--name <text>] [--course scy|scm|lcm] [--type <meet_type>] [--body <body>] [--after <date>] [--before <date>] [--limit <n>]',
      async run(ctx, args) {
        const meets = await ctx.client.get('/api/v1/meets', z.array(meetSchema), {
          name: option(args, 'name'),
          course: option(args, 'course'),
          meet_type: option(args, 'type'),
          sanctioning_body: option(args, 'body'),
          start_after: option(args, 'after'),
          start_before: option(args, 'before'),
          limit: intOption(args, 'limit'),
        });
        printTable(
          ctx,
          ['ID', 'Name', 'City', 'Start', 'Course', 'Type'],
          meets.map((meet) => [meet.id, meet.name, meet.city, meet.start_date, meet.course, meet.meet_type]),
        );
      },
    },
    get: {
      usage: 'meets get <meet>',
      async run(ctx, args) {
        const meet = await resolveMeet(ctx.client, positional(args, 0, 'meet'));
        ctx.out(
          formatDetails([
            ['ID', meet.id],
            ['Name', meet.name],
            ['City', meet.state ? `${meet.city}, ${meet.state}` : meet.city],
            ['Dates', meet.end_date ? `${meet.start_date} to ${meet.end_date}` : meet.start_date],
            ['Course', meet.course],
            ['Lanes', meet.lanes],
            ['Indoor', meet.indoor],
            ['Type', meet.meet_type],
            ['Body', meet.sanctioning_body],
          ]),
        );
      },
    },
    create: {
      usage:
        'meets create --name <name> --location <pool> --city <city> --start-date <date> --course <course> --body <body> --type <meet_type> [--end-date <date>] [--state <s>] [--country <c>] [--lanes 6|8|10] [--outdoor]',
      async run(ctx, args) {
        for (const name of ['name', 'location', 'city', 'start-date', 'course', 'body', 'type']) {
          requireOption(args, name);
        }
        const meet = await ctx.client.post('/api/v1/meets', meetSchema, meetFields(args));
        ctx.out(`Created meet ${meet.name} (${meet.id})`);
      },
    },
    update: {
      usage: 'meets update <meet> [--name|--location|--city|--start-date|--end-date|--course|--lanes|--body|--type <value>] [--indoor|--outdoor]',
      async run(ctx, args) {
        const existing = await resolveMeet(ctx.client, positional(args, 0, 'meet'));
        const meet = await ctx.client.patch(`/api/v1/meets/${existing.id}`, meetSchema, meetFields(args));
        ctx.out(`Updated meet ${meet.name} (${meet.id})`);
      },
    },
    delete: {
      usage: 'meets delete <meet>',
      async run(ctx, args) {
        const meet = await resolveMeet(ctx.client, positional(args, 0, 'meet'));
        await ctx.client.delete(`/api/v1/meets/${meet.id}`);
        ctx.out(`Deleted meet ${meet.name}`);
      },
    },
    teams: {
      usage: 'meets teams <meet>',
      async run(ctx, args) {
        const meet = await resolveMeet(ctx.client, positional(args, 0, 'meet'));
        const entries = await ctx.client.get(`/api/v1/meets/${meet.id}/teams`, z.array(meetTeamSchema));
        printTable(
          ctx,
          ['Team', 'Host'],
          entries.map((entry) => [entry.team_name ?? entry.team_id, entry.is_host]),
        );
      },
    },
    'add-team': {
      usage: 'meets add-team <meet> <team> [--host]',
      async run(ctx, args) {
        const meet = await resolveMeet(ctx.client, positional(args, 0, 'meet'));
        const team = await resolveTeam(ctx.client, positional(args, 1, 'team'));
        const entry = await ctx.client.post(`/api/v1/meets/${meet.id}/teams`, meetTeamSchema, {
          team_id: team.id,
          is_host: hasFlag(args, 'host'),
        });
        ctx.out(`Added ${team.name} to ${meet.name}${entry.is_host ? ' as host' : ''}`);
      },
    },
    'remove-team': {
      usage: 'meets remove-team <meet> <team>',
      async run(ctx, args) {
        const meet = await resolveMeet(ctx.client, positional(args, 0, 'meet'));
        const team = await resolveTeam(ctx.client, positional(args, 1, 'team'));
        await ctx.client.delete(`/api/v1/meets/${meet.id}/teams/${team.id}`);
        ctx.out(`Removed ${team.name} from ${meet.name}`);
      },
    },
  },
};
