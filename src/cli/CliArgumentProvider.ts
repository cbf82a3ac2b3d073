import Mri from 'mri';
import { getAppInfo } from '../constants.js';
import CliUsageError from './CliUsageError.js';

export type PlayerHeadArguments = {
  player: string | null;
  fullBody: boolean;
  hat: boolean;
  quiet: boolean;
  usePersonId: boolean;
  fromPeopleFile: boolean;
  whitelist: boolean;
  size: number | null;
  height: number | null;
  outputDir: string | null;
  peopleFile: string | null;
  whitelistFile: string | null;
};

export type CliInvocation =
  | { action: 'help' }
  | { action: 'version' }
  | { action: 'run', args: PlayerHeadArguments };

export default class CliArgumentProvider {
  static readonly USAGE = `Generates PNG images of Minecraft player heads from their skins.

Usage:
  playerhead [options] [<player>]
  playerhead -h | --help
  playerhead --version

Options:
  -h, --help               Print this message and exit.
  -i, --use-person-id      Save the image with the person's id instead of their Minecraft name.
  -o, --output-dir=<dir>   Directory the images are saved in. Defaults to a subdirectory of PLAYERHEAD_OUTPUT_DIR, depending on --size.
  -p, --from-people-file   Get player names from the people database.
  -q, --quiet              Do not print error messages.
  -s, --size=<pixels>      Resize the image to this width, using the nearest-neighbor algorithm.
  --full-body              Generate a front view of the entire skin, not just the head.
  --height=<pixels>        Resize the image to this height. Defaults to a height proportional to the width.
  --no-hat                 Don't include the overlay layers (hat, jacket, sleeves, pants).
  --people-file=<file>     Path to the people database, used only with --from-people-file.
  --version                Print version info and exit.
  --whitelist              Get player names from the whitelist, either a JSON or a plaintext whitelist.
  --whitelist-file=<file>  Path to the server whitelist, used only with --whitelist.

Without <player>, --from-people-file or --whitelist, player names are read from stdin, one per line.`;

  /**
   * Prints help or version and exits if requested, exits with status 1 on invalid arguments
   */
  static determineAppArguments(argv: string[] = process.argv.slice(2)): PlayerHeadArguments {
    let invocation: CliInvocation;
    try {
      invocation = this.parse(argv);
    } catch (err: unknown) {
      if (err instanceof CliUsageError) {
        console.error(err.message);
        console.error('See playerhead --help');
        process.exit(1);
      }
      throw err;
    }

    if (invocation.action === 'help') {
      console.log(this.USAGE);
      process.exit(0);
    }
    if (invocation.action === 'version') {
      this.printVersion();
      process.exit(0);
    }
    return invocation.args;
  }

  /**
   * @throws CliUsageError
   */
  static parse(argv: string[]): CliInvocation {
    const parsedArgs = Mri<Record<string, unknown>>(argv, {
      boolean: ['help', 'version', 'use-person-id', 'from-people-file', 'quiet', 'full-body', 'hat', 'whitelist'],
      string: ['output-dir', 'size', 'height', 'people-file', 'whitelist-file'],
      alias: {
        help: 'h',
        'use-person-id': 'i',
        'output-dir': 'o',
        'from-people-file': 'p',
        quiet: 'q',
        size: 's'
      },
      default: {
        hat: true
      },
      unknown(flag: string): void {
        throw new CliUsageError(`Unknown flag ${JSON.stringify(flag)}`);
      }
    });

    if (parsedArgs.help === true) {
      return { action: 'help' };
    }
    if (parsedArgs.version === true) {
      return { action: 'version' };
    }

    const positionalArgs = parsedArgs._.map(arg => String(arg));
    if (positionalArgs.length > 1) {
      throw new CliUsageError(`Expected at most one player name, got ${positionalArgs.length}`);
    }

    const args: PlayerHeadArguments = {
      player: positionalArgs[0] ?? null,
      fullBody: parsedArgs['full-body'] === true,
      hat: parsedArgs.hat !== false,
      quiet: parsedArgs.quiet === true,
      usePersonId: parsedArgs['use-person-id'] === true,
      fromPeopleFile: parsedArgs['from-people-file'] === true,
      whitelist: parsedArgs.whitelist === true,
      size: this.parsePositiveInteger('--size', parsedArgs.size),
      height: this.parsePositiveInteger('--height', parsedArgs.height),
      outputDir: this.parseString('--output-dir', parsedArgs['output-dir']),
      peopleFile: this.parseString('--people-file', parsedArgs['people-file']),
      whitelistFile: this.parseString('--whitelist-file', parsedArgs['whitelist-file'])
    };

    if (args.fromPeopleFile && args.whitelist) {
      throw new CliUsageError('--from-people-file and --whitelist cannot be combined');
    }
    if (args.player != null && (args.fromPeopleFile || args.whitelist)) {
      throw new CliUsageError('A player name cannot be combined with --from-people-file or --whitelist');
    }

    return { action: 'run', args };
  }

  private static printVersion(): void {
    const appInfo = getAppInfo();
    console.log(`${appInfo.name} v${appInfo.version}`);
  }

  private static parseString(flag: string, value: unknown): string | null {
    if (value == null) {
      return null;
    }
    if (Array.isArray(value)) {
      throw new CliUsageError(`${flag} can only be given once`);
    }

    const stringValue = String(value);
    if (stringValue === '') {
      throw new CliUsageError(`${flag} requires a value`);
    }
    return stringValue;
  }

  private static parsePositiveInteger(flag: string, value: unknown): number | null {
    const stringValue = this.parseString(flag, value);
    if (stringValue == null) {
      return null;
    }

    if (!/^[0-9]+$/.test(stringValue) || parseInt(stringValue, 10) <= 0) {
      throw new CliUsageError(`Invalid value for ${flag} ${JSON.stringify(stringValue)} – Expected a positive number`);
    }
    return parseInt(stringValue, 10);
  }
}
