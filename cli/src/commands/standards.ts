import { z } from 'zod';
import { UsageError, hasFlag, intOption, option, requireOption } from '../args.js';
import { resolveEvent } from '../resolve.js';
import { qualificationSchema, standardSchema } from '../schemas.js';
import { printTable, type CommandGroup } from '../command.js';
import { printQualification } from './times.js';

export const standardCommands: CommandGroup = {
  summary: 'Time standards and qualification checks',
  subcommands: {
    list: {
      usage:
        'standards list [--event "100 free scy"] [--gender M|F] [--age-group <label>] [--body <body>] [--standard <name>] [--year <n>] [--equivalents] [--limit <n>]',
      async run(ctx, args) {
        const eventRef = option(args, 'event');
        const event = eventRef === undefined ? undefined : await resolveEvent(ctx.client, eventRef);
        const standards = await ctx.client.get('/api/v1/time-standards', z.array(standardSchema), {
          stroke: event?.stroke,
          distance: event?.distance,
          course: event?.course,
          gender: option(args, 'gender'),
          age_group: option(args, 'age-group'),
          sanctioning_body: option(args, 'body'),
          standard_name: option(args, 'standard'),
          effective_year: intOption(args, 'year'),
          include_equivalents: hasFlag(args, 'equivalents') || undefined,
          limit: intOption(args, 'limit'),
        });
        printTable(
          ctx,
          ['Event', 'Gender', 'Age group', 'Standard', 'Cut', 'Time', 'Year'],
          standards.map((standard) => [
            standard.event?.label,
            standard.gender,
            standard.age_group,
            `${standard.sanctioning_body} ${standard.standard_name}`,
            standard.cut_level,
            standard.time_formatted,
            standard.effective_year,
          ]),
        );
      },
    },
    qualify: {
      usage:
        'standards qualify --event "100 free scy" --time <m:ss.hh> --gender M|F (--age <n> | --dob <YYYY-MM-DD>) [--date <YYYY-MM-DD>] [--body <body>] [--standard <name>]',
      async run(ctx, args) {
        const age = intOption(args, 'age');
        const dateOfBirth = option(args, 'dob');
        if (age === undefined && dateOfBirth === undefined) {
          throw new UsageError('--age or --dob is required');
        }

        const result = await ctx.client.post('/api/v1/time-standards/qualify', qualificationSchema, {
          event: requireOption(args, 'event'),
          time_formatted: requireOption(args, 'time'),
          gender: requireOption(args, 'gender'),
          age,
          date_of_birth: dateOfBirth,
          swim_date: option(args, 'date'),
          sanctioning_body: option(args, 'body'),
          standard_name: option(args, 'standard'),
        });
        printQualification(ctx, result);
      },
    },
  },
};
