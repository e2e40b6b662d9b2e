/**
 * Experiment CLI Arguments
 */

export interface CliOptions {
  mock: boolean;
  sync: boolean;
  steps?: number;
  seed?: number;
  reviews?: string;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { mock: false, sync: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--mock":
        options.mock = true;
        break;
      case "--sync":
        options.sync = true;
        break;
      case "--steps":
        options.steps = parseIntFlag(arg, argv[++i]);
        break;
      case "--seed":
        options.seed = parseIntFlag(arg, argv[++i]);
        break;
      case "--reviews": {
        const value = argv[++i];
        if (!value) throw new Error("--reviews requires a path");
        options.reviews = value;
        break;
      }
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

function parseIntFlag(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (!value || !Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${flag} requires a non-negative integer`);
  }
  return parsed;
}
