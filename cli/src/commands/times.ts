import { z } from 'zod';
import { hasFlag, intOption, option, positional, requireOption } from '../args.js';
import { formatDetails, formatSeconds } from '../output.js';
import { resolveEvent, resolveMeet, resolveSwimmer, resolveTeam } from '../resolve.js';
import {
  analysisSchema,
  detailedSwimTimeSchema,
  personalBestSchema,
  swimStandardsSchema,
  swimTimeSchema,
  type Qualification,
} from '../schemas.js';
import { printTable, type CommandGroup, type CommandHandler } from '../command.js';
import type { CliContext } from '../context.js';

export function printQualification(ctx: CliContext, result: Qualification) {
  ctx.out(`${result.event.label} in ${result.time_formatted} at age ${result.age}${result.valid ? '' : ' (not a valid swim)'}`);
  printTable(
    ctx,
    ['Standard', 'Cut', 'Age group', 'Made', 'Margin'],
    result.standards.map((entry) => [
      `${entry.standard.sanctioning_body} ${entry.standard.standard_name} ${entry.standard.cut_level}`,
      entry.time_formatted,
      entry.standard.age_group,
      entry.achieved,
      formatSeconds(entry.margin_seconds),
    ]),
  );
  if (result.best_achieved) {
    ctx.out(`Best cut: ${result.best_achieved.standard.cut_level}`);
  }
  if (result.next_standard) {
    ctx.out(
      `Next cut: ${result.next_standard.standard.cut_level} (${formatSeconds(result.next_standard.margin_seconds)})`,
    );
  }
}

export const personalBests: CommandHandler = async (ctx, args) => {
  const swimmer = await resolveSwimmer(ctx.client, positional(args, 0, 'swimmer'));
  const bests = await ctx.client.get(`/api/v1/swimmers/${swimmer.id}/personal-bests`, z.array(personalBestSchema));
  printTable(
    ctx,
    ['Event', 'Time', 'Date', 'Swim ID'],
    bests.map((best) => [best.event?.label ?? best.event_id, best.time_formatted, best.swim_date, best.id]),
  );
};

export const timeCommands: CommandGroup = {
  summary: 'Record and review swims',
  subcommands: {
    list: {
      usage: 'times list [--swimmer <swimmer>] [--event <event>] [--meet <meet>] [--round <round>] [--from <date>] [--to <date>] [--all] [--limit <n>]',
      async run(ctx, args) {
        const swimmerRef = option(args, 'swimmer');
        const eventRef = option(args, 'event');
        const meetRef = option(args, 'meet');
        const swims = await ctx.client.get('/api/v1/swim-times', z.array(swimTimeSchema), {
          swimmer_id: swimmerRef === undefined ? undefined : (await resolveSwimmer(ctx.client, swimmerRef)).id,
          event_id: eventRef === undefined ? undefined : (await resolveEvent(ctx.client, eventRef)).id,
          meet_id: meetRef === undefined ? undefined : (await resolveMeet(ctx.client, meetRef)).id,
          round: option(args, 'round'),
          start_date: option(args, 'from'),
          end_date: option(args, 'to'),
          official_only: hasFlag(args, 'all') ? false : undefined,
          exclude_dq: hasFlag(args, 'all') ? false : undefined,
          limit: intOption(args, 'limit'),
        });
        printTable(
          ctx,
          ['ID', 'Time', 'Date', 'Round', 'Official', 'DQ'],
          swims.map((swim) => [swim.id, swim.time_formatted, swim.swim_date, swim.round, swim.official, swim.dq]),
        );
      },
    },
    record: {
      usage:
        'times record --swimmer <swimmer> --event <event> --meet <meet> --team <team> --time <m:ss.hh> --date <YYYY-MM-DD> [--round <round>] [--lane <n>] [--place <n>] [--splits "50:28.27;100:58.44"] [--dq] [--dq-reason <text>] [--unofficial] [--suit <suit-id>]',
      async run(ctx, args) {
        const swimmer = await resolveSwimmer(ctx.client, requireOption(args, 'swimmer'));
        const event = await resolveEvent(ctx.client, requireOption(args, 'event'));
        const meet = await resolveMeet(ctx.client, requireOption(args, 'meet'));
        const team = await resolveTeam(ctx.client, requireOption(args, 'team'));

        const swim = await ctx.client.post('/api/v1/swim-times', detailedSwimTimeSchema, {
          swimmer_id: swimmer.id,
          event_id: event.id,
          meet_id: meet.id,
          team_id: team.id,
          time_formatted: requireOption(args, 'time'),
          swim_date: requireOption(args, 'date'),
          round: option(args, 'round'),
          lane: intOption(args, 'lane'),
          place: intOption(args, 'place'),
          splits: option(args, 'splits'),
          dq: hasFlag(args, 'dq'),
          dq_reason: option(args, 'dq-reason'),
          official: !hasFlag(args, 'unofficial'),
          suit_id: option(args, 'suit'),
        });

        ctx.out(`Recorded ${swimmer.full_name} ${event.label} ${swim.time_formatted} (${swim.id})`);
        if (swim.splits.length > 0) {
          printTable(
            ctx,
            ['Distance', 'Split', 'Interval'],
            swim.splits.map((split) => [split.distance, split.time_formatted, split.interval_formatted]),
          );
        }
      },
    },
    pbs: {
      usage: 'times pbs <swimmer>',
      run: personalBests,
    },
    compare: {
      usage: 'times compare <swim-time-id>',
      async run(ctx, args) {
        const id = positional(args, 0, 'swim-time-id');
        const analysis = await ctx.client.get(`/api/v1/swim-times/analysis/${encodeURIComponent(id)}`, analysisSchema);
        ctx.out(
          formatDetails([
            ['Swim', `${analysis.swim_time.time_formatted} on ${analysis.swim_time.swim_date}`],
            ['Personal best', analysis.personal_best?.time_formatted],
            ['Is PB', analysis.is_personal_best],
            ['Off PB', analysis.time_off_pb === null ? null : formatSeconds(analysis.time_off_pb)],
            [
              'Change',
              analysis.improvement_percentage === null ? null : `${analysis.improvement_percentage.toFixed(2)}%`,
            ],
          ]),
        );
      },
    },
    standards: {
      usage: 'times standards <swim-time-id> [--body <body>] [--standard <name>]',
      async run(ctx, args) {
        const id = positional(args, 0, 'swim-time-id');
        const result = await ctx.client.get(`/api/v1/swim-times/${encodeURIComponent(id)}/standards`, swimStandardsSchema, {
          sanctioning_body: option(args, 'body'),
          standard_name: option(args, 'standard'),
        });
        printQualification(ctx, result);
        for (const split of result.split_standards) {
          if (split.achieved.length > 0) {
            const cuts = split.achieved.map((entry) => entry.standard.cut_level).join(', ');
            ctx.out(`Split at ${split.distance} (${split.time_formatted}) makes ${split.event.label}: ${cuts}`);
          }
        }
      },
    },
  },
};
