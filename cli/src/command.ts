import type { ParsedArgs } from './args.js';
import type { CliContext } from './context.js';
import { formatTable, type Cell } from './output.js';

export type CommandHandler = (ctx: CliContext, args: ParsedArgs) => Promise<void>;

export interface Subcommand {
  usage: string;
  run: CommandHandler;
}

export interface CommandGroup {
  summary: string;
  subcommands: Record<string, Subcommand>;
}

export function printTable(ctx: CliContext, headers: readonly string[], rows: readonly (readonly Cell[])[]) {
  if (rows.length === 0) {
    ctx.out('No results.');
    return;
  }
  ctx.out(formatTable(headers, rows));
}
