import { z } from 'zod';
import { hasFlag, intOption, option, pickOptions, positional, requireOption, type ParsedArgs } from '../args.js';
import { formatDetails } from '../output.js';
import { resolveSwimmer, resolveTeam } from '../resolve.js';
import { membershipSchema, swimmerQualificationsSchema, swimmerSchema } from '../schemas.js';
import { printTable, type CommandGroup } from '../command.js';
import { personalBests } from './times.js';

function swimmerFields(args: ParsedArgs) {
  return {
    ...pickOptions(args, ['first-name', 'last-name', 'gender', 'usa-id', 'swimcloud-url']),
    ...(option(args, 'dob') === undefined ? {} : { date_of_birth: option(args, 'dob') }),
  };
}

function renameUsaId(fields: Record<string, string | undefined>) {
  const { usa_id: usaId, ...rest } = fields;
  return usaId === undefined ? rest : { ...rest, usa_swimming_id: usaId };
}

export const swimmerCommands: CommandGroup = {
  summary: 'Swimmers, their teams and results',
  subcommands: {
    list: {
      usage: 'swimmers list [--name <text>] [--gender M|F] [--min-age <n>] [--max-age <n>] [--limit <n>]',
      async run(ctx, args) {
        const swimmers = await ctx.client.get('/api/v1/swimmers', z.array(swimmerSchema), {
          name: option(args, 'name'),
          gender: option(args, 'gender'),
          min_age: intOption(args, 'min-age'),
          max_age: intOption(args, 'max-age'),
          limit: intOption(args, 'limit'),
        });
        printTable(
          ctx,
          ['ID', 'Name', 'Gender', 'Age', 'Group', 'USA Swimming ID'],
          swimmers.map((swimmer) => [
            swimmer.id,
            swimmer.full_name,
            swimmer.gender,
            swimmer.age,
            swimmer.age_group,
            swimmer.usa_swimming_id,
          ]),
        );
      },
    },
    get: {
      usage: 'swimmers get <swimmer>',
      async run(ctx, args) {
        const swimmer = await resolveSwimmer(ctx.client, positional(args, 0, 'swimmer'));
        ctx.out(
          formatDetails([
            ['ID', swimmer.id],
            ['Name', swimmer.full_name],
            ['Born', swimmer.date_of_birth],
            ['Gender', swimmer.gender],
            ['Age', swimmer.age],
            ['Age group', swimmer.age_group],
            ['USA Swimming ID', swimmer.usa_swimming_id],
          ]),
        );
      },
    },
    create: {
      usage: 'swimmers create --first-name <name> --last-name <name> --dob <YYYY-MM-DD> --gender M|F [--usa-id <id>] [--swimcloud-url <url>]',
      async run(ctx, args) {
        for (const name of ['first-name', 'last-name', 'dob', 'gender']) {
          requireOption(args, name);
        }
        const swimmer = await ctx.client.post('/api/v1/swimmers', swimmerSchema, renameUsaId(swimmerFields(args)));
        ctx.out(`Created swimmer ${swimmer.full_name} (${swimmer.id})`);
      },
    },
    update: {
      usage: 'swimmers update <swimmer> [--first-name|--last-name|--dob|--gender|--usa-id|--swimcloud-url <value>]',
      async run(ctx, args) {
        const existing = await resolveSwimmer(ctx.client, positional(args, 0, 'swimmer'));
        const swimmer = await ctx.client.patch(
          `/api/v1/swimmers/${existing.id}`,
          swimmerSchema,
          renameUsaId(swimmerFields(args)),
        );
        ctx.out(`Updated swimmer ${swimmer.full_name} (${swimmer.id})`);
      },
    },
    delete: {
      usage: 'swimmers delete <swimmer>',
      async run(ctx, args) {
        const swimmer = await resolveSwimmer(ctx.client, positional(args, 0, 'swimmer'));
        await ctx.client.delete(`/api/v1/swimmers/${swimmer.id}`);
        ctx.out(`Deleted swimmer ${swimmer.full_name}`);
      },
    },
    teams: {
      usage: 'swimmers teams <swimmer> [--all]',
      async run(ctx, args) {
        const swimmer = await resolveSwimmer(ctx.client, positional(args, 0, 'swimmer'));
        const memberships = await ctx.client.get(`/api/v1/swimmers/${swimmer.id}/teams`, z.array(membershipSchema), {
          current_only: hasFlag(args, 'all') ? false : undefined,
        });
        printTable(
          ctx,
          ['Team', 'Start', 'End', 'Current'],
          memberships.map((membership) => [
            membership.team_name ?? membership.team_id,
            membership.start_date,
            membership.end_date,
            membership.is_current,
          ]),
        );
      },
    },
    assign: {
      usage: 'swimmers assign <swimmer> <team> [--start-date <YYYY-MM-DD>]',
      async run(ctx, args) {
        const swimmer = await resolveSwimmer(ctx.client, positional(args, 0, 'swimmer'));
        const team = await resolveTeam(ctx.client, positional(args, 1, 'team'));
        await ctx.client.post(`/api/v1/swimmers/${swimmer.id}/teams`, membershipSchema, {
          team_id: team.id,
          start_date: option(args, 'start-date'),
        });
        ctx.out(`Added ${swimmer.full_name} to ${team.name}`);
      },
    },
    unassign: {
      usage: 'swimmers unassign <swimmer> <team> [--end-date <YYYY-MM-DD>]',
      async run(ctx, args) {
        const swimmer = await resolveSwimmer(ctx.client, positional(args, 0, 'swimmer'));
        const team = await resolveTeam(ctx.client, positional(args, 1, 'team'));
        const membership = await ctx.client.request('DELETE', `/api/v1/swimmers/${swimmer.id}/teams/${team.id}`, {
          schema: membershipSchema,
          query: { end_date: option(args, 'end-date') },
        });
        ctx.out(`Ended ${swimmer.full_name}'s membership in ${team.name} on ${membership.end_date ?? '-'}`);
      },
    },
    pbs: {
      usage: 'swimmers pbs <swimmer>',
      run: personalBests,
    },
    qualifications: {
      usage: 'swimmers qualifications <swimmer> [--body <body>] [--standard <name>] [--year <n>] [--as-of <YYYY-MM-DD>]',
      async run(ctx, args) {
        const swimmer = await resolveSwimmer(ctx.client, positional(args, 0, 'swimmer'));
        const report = await ctx.client.get(
          `/api/v1/swimmers/${swimmer.id}/qualifications`,
          swimmerQualificationsSchema,
          {
            sanctioning_body: option(args, 'body'),
            standard_name: option(args, 'standard'),
            effective_year: intOption(args, 'year'),
            as_of: option(args, 'as-of'),
          },
        );

        ctx.out(`${report.swimmer.full_name}, age ${report.age} as of ${report.as_of}`);
        const rows = report.groups.flatMap((group) =>
          group.rows.map((row) => [
            row.event.label,
            `${row.standard.standard_name} ${row.standard.cut_level}`,
            row.cut_formatted,
            row.best_time?.time_formatted,
            row.achieved,
            row.margin_seconds,
          ]),
        );
        printTable(ctx, ['Event', 'Standard', 'Cut', 'Best', 'Made', 'Margin (s)'], rows);
      },
    },
  },
};
