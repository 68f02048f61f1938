export interface CliArgs {
  list?: boolean;
  sample?: string;
  lang?: string;
  out?: string;
  pretty?: boolean;
  serve?: boolean;
  port?: number;
  version?: string;
}

export const USAGE =
  "Usage: cardsmith --sample <name> [--lang <code>] [--version <card-version>] [--out <file>] [--pretty] | --list | --serve [--port <n>]";

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];

    if (token === "--list") {
      args.list = true;
      continue;
    }

    if (token === "--sample") {
      args.sample = argv[i + 1];
      i += 1;
      continue;
    }

    if (token === "--lang") {
      args.lang = argv[i + 1];
      i += 1;
      continue;
    }

    if (token === "--out") {
      args.out = argv[i + 1];
      i += 1;
      continue;
    }

    if (token === "--version") {
      args.version = argv[i + 1];
      i += 1;
      continue;
    }

    if (token === "--pretty") {
      args.pretty = true;
      continue;
    }

    if (token === "--serve") {
      args.serve = true;
      continue;
    }

    if (token === "--port") {
      args.port = parseInt(argv[i + 1], 10);
      i += 1;
    }
  }

  return args;
}

export function assertArgs(args: CliArgs): void {
  if (args.port !== undefined && Number.isNaN(args.port)) {
    throw new Error("--port expects a number.");
  }

  if (args.list || args.serve) {
    return;
  }

  if (!args.sample) {
    throw new Error(`Missing required args. ${USAGE}`);
  }
}
