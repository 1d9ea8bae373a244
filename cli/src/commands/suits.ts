import { z } from 'zod';
import { hasFlag, intOption, option, positional, requireOption } from '../args.js';
import { resolveSwimmer } from '../resolve.js';
import { suitModelSchema, swimmerSuitSchema } from '../schemas.js';
import { printTable, type CommandGroup } from '../command.js';

function modelName(suit: z.infer<typeof swimmerSuitSchema>) {
  return suit.suit_model ? `${suit.suit_model.brand} ${suit.suit_model.model_name}` : null;
}

export const suitCommands: CommandGroup = {
  summary: 'Racing suit catalog and inventory',
  subcommands: {
    models: {
      usage: 'suits models [--brand <brand>] [--type <suit_type>] [--gender M|F] [--tech]',
      async run(ctx, args) {
        const models = await ctx.client.get('/api/v1/suits/models', z.array(suitModelSchema), {
          brand: option(args, 'brand'),
          suit_type: option(args, 'type'),
          gender: option(args, 'gender'),
          tech_only: hasFlag(args, 'tech') || undefined,
        });
        printTable(
          ctx,
          ['ID', 'Brand', 'Model', 'Type', 'Gender', 'Tech', 'MSRP', 'Races'],
          models.map((model) => [
            model.id,
            model.brand,
            model.model_name,
            model.suit_type,
            model.gender,
            model.is_tech_suit,
            model.msrp_formatted,
            model.expected_races_total,
          ]),
        );
      },
    },
    inventory: {
      usage: 'suits inventory <swimmer> [--all]',
      async run(ctx, args) {
        const swimmer = await resolveSwimmer(ctx.client, positional(args, 0, 'swimmer'));
        const suits = await ctx.client.get('/api/v1/suits/inventory', z.array(swimmerSuitSchema), {
          swimmer_id: swimmer.id,
          active_only: hasFlag(args, 'all') ? false : undefined,
        });
        printTable(
          ctx,
          ['ID', 'Suit', 'Nickname', 'Size', 'Condition', 'Races', 'Left'],
          suits.map((suit) => [
            suit.id,
            modelName(suit),
            suit.nickname,
            suit.size,
            suit.condition,
            suit.race_count,
            suit.remaining_races,
          ]),
        );
      },
    },
    add: {
      usage:
        'suits add <swimmer> --model <suit-model-id> [--size <size>] [--nickname <name>] [--color <color>] [--purchase-date <date>] [--price-cents <n>]',
      async run(ctx, args) {
        const swimmer = await resolveSwimmer(ctx.client, positional(args, 0, 'swimmer'));
        const suit = await ctx.client.post('/api/v1/suits/inventory', swimmerSuitSchema, {
          swimmer_id: swimmer.id,
          suit_model_id: requireOption(args, 'model'),
          size: option(args, 'size'),
          nickname: option(args, 'nickname'),
          color: option(args, 'color'),
          purchase_date: option(args, 'purchase-date'),
          purchase_price_cents: intOption(args, 'price-cents'),
        });
        ctx.out(`Added ${modelName(suit) ?? 'suit'} for ${swimmer.full_name} (${suit.id})`);
      },
    },
    retire: {
      usage: 'suits retire <suit-id> [--reason <text>] [--date <YYYY-MM-DD>]',
      async run(ctx, args) {
        const id = positional(args, 0, 'suit-id');
        const suit = await ctx.client.post(`/api/v1/suits/inventory/${encodeURIComponent(id)}/retire`, swimmerSuitSchema, {
          retirement_reason: option(args, 'reason'),
          retired_date: option(args, 'date'),
        });
        ctx.out(`Retired ${modelName(suit) ?? suit.id} after ${suit.race_count} races`);
      },
    },
  },
};
