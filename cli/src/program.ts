import { ZodError } from 'zod';
import { UsageError, parseArgs } from './args.js';
import { ApiError, NotLoggedInError } from './client.js';
import { createContext, type CliContext } from './context.js';
import type { CommandGroup } from './command.js';
import { authCommands } from './commands/auth.js';
import { teamCommands } from './commands/teams.js';
import { swimmerCommands } from './commands/swimmers.js';
import { meetCommands } from './commands/meets.js';
import { timeCommands } from './commands/times.js';
import { standardCommands } from './commands/standards.js';
import { eventCommands } from './commands/events.js';
import { invitationCommands, userCommands } from './commands/invitations.js';
import { followCommands } from './commands/follows.js';
import { suitCommands } from './commands/suits.js';

export const COMMANDS: Record<string, CommandGroup> = {
  auth: authCommands,
  teams: teamCommands,
  swimmers: swimmerCommands,
  meets: meetCommands,
  times: timeCommands,
  standards: standardCommands,
  events: eventCommands,
  invite: invitationCommands,
  users: userCommands,
  follows: followCommands,
  suits: suitCommands,
};

export function helpText(groupName?: string) {
  const group = groupName === undefined ? undefined : COMMANDS[groupName];
  if (group) {
    return [group.summary, '', ...Object.values(group.subcommands).map((sub) => `  swimcuts ${sub.usage}`)].join('\n');
  }

  const width = Math.max(...Object.keys(COMMANDS).map((name) => name.length));
  return [
    'Usage: swimcuts <command> <subcommand> [options]',
    '',
    'Commands:',
    ...Object.entries(COMMANDS).map(([name, entry]) => `  ${name.padEnd(width)}  ${entry.summary}`),
    '',
    "Run 'swimcuts <command> --help' for a command's subcommands.",
  ].join('\n');
}

export async function run(argv: readonly string[], ctx: CliContext = createContext()): Promise<number> {
  const [groupName, subName, ...rest] = argv;

  if (groupName === undefined || groupName === 'help' || groupName === '--help' || groupName === '-h') {
    ctx.out(helpText(subName));
    return 0;
  }

  const group = COMMANDS[groupName];
  if (!group) {
    ctx.err(`Unknown command: ${groupName}\n\n${helpText()}`);
    return 1;
  }

  if (subName === undefined || subName === '--help' || subName === '-h') {
    ctx.out(helpText(groupName));
    return 0;
  }

  const subcommand = group.subcommands[subName];
  if (!subcommand) {
    ctx.err(`Unknown subcommand: ${groupName} ${subName}\n\n${helpText(groupName)}`);
    return 1;
  }

  const args = parseArgs(rest);
  if (args.flags.has('help')) {
    ctx.out(`Usage: swimcuts ${subcommand.usage}`);
    return 0;
  }

  try {
    await subcommand.run(ctx, args);
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      ctx.err(`Error: ${error.message}\nUsage: swimcuts ${subcommand.usage}`);
      return 1;
    }
    if (error instanceof ApiError) {
      ctx.err(`Error (${error.status}): ${error.message}`);
      return 1;
    }
    if (error instanceof NotLoggedInError) {
      ctx.err(error.message);
      return 1;
    }
    if (error instanceof ZodError) {
      ctx.err(`Unexpected response from server: ${error.issues.map((issue) => issue.path.join('.')).join(', ')}`);
      return 1;
    }
    throw error;
  }
}
