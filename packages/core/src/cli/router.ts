/**
 * CLI Router — resolves `argv` to a registered command.
 *
 * `argv[2]` names the command (or one of its aliases). No subcommand, a
 * leading flag or an unknown name fall through to the default command with
 * the remaining arguments untouched.
 */

export interface CommandContext {
  argv: string[];
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

export interface Command {
  name: string;
  aliases?: string[];
  description: string;
  usage: string;
  run(ctx: CommandContext): Promise<number>;
}

export interface Router {
  register(command: Command): void;
  resolve(argv: string[]): { command: Command; rest: string[] };
  getCommands(): Command[];
  printHelp(stream: NodeJS.WritableStream): void;
}

export function createRouter(defaultCommand = 'start'): Router {
  const commands: Command[] = [];
  const byName = new Map<string, Command>();

  return {
    register(command) {
      commands.push(command);
      byName.set(command.name, command);
      for (const alias of command.aliases ?? []) {
        byName.set(alias, command);
      }
    },

    resolve(argv) {
      const args = argv.slice(2);
      const first = args[0];
      const named = first !== undefined && !first.startsWith('-') ? byName.get(first) : undefined;
      if (named) {
        return { command: named, rest: args.slice(1) };
      }

      const fallback = byName.get(defaultCommand);
      if (!fallback) {
        throw new Error(`Default command "${defaultCommand}" not registered`);
      }
      return { command: fallback, rest: args };
    },

    getCommands() {
      return [...commands];
    },

    printHelp(stream) {
      const width = Math.max(...commands.map((c) => c.name.length), 4);
      stream.write('\nUsage: tiermind <command> [options]\n\nCommands:\n');
      for (const command of commands) {
        const aliases = command.aliases?.length ? ` (${command.aliases.join(', ')})` : '';
        stream.write(`  ${command.name.padEnd(width)}  ${command.description}${aliases}\n`);
      }
      stream.write(`\nRun 'tiermind <command> --help' for command options.\n\n`);
    },
  };
}
