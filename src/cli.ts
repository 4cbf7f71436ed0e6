import { parseArgs } from "util";
import { Defaults } from "./constants";
import { IpResolver } from "./ip_resolver";
import { log, setLogLevel } from "./log";
import type { CliConfig, IpMode, ResolvedAddress } from "./types";

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const MODE_FLAGS = {
  auto: { mode: 0, label: "-a/--auto" },
  ipv4: { mode: 4, label: "-4/--ipv4" },
  ipv6: { mode: 6, label: "-6/--ipv6" },
} as const satisfies Record<string, { mode: IpMode; label: string }>;

type ModeFlag = keyof typeof MODE_FLAGS;

function isModeFlag(name: string): name is ModeFlag {
  return Object.prototype.hasOwnProperty.call(MODE_FLAGS, name);
}

export function usage(): string {
  const p = Defaults.PROGRAM;
  return [
    `usage: ${p} [-h] [-a | -4 | -6] [-f FAILURE_MESSAGE] [-t MS] [-v]`,
    "",
    "Print the public IP address of this host",
    "",
    "options:",
    "  -h, --help            show this help message and exit",
    "  -a, --auto            try IPv6, then IPv4 (default)",
    "  -4, --ipv4            only look up the IPv4 address",
    "  -6, --ipv6            only look up the IPv6 address",
    "  -f, --failure_message FAILURE_MESSAGE",
    `                        printed when no address is found (default: "${Defaults.FAILURE_MESSAGE}")`,
    "  -t, --timeout MS      give up on a connection or read after MS milliseconds",
    "  -v, --verbose         write debug logs to stderr",
    "",
    "If --auto is specified, first attempt to retrieve IPv6 address. Then fall",
    "back to IPv4 if that fails. If no option is specified, --auto is assumed.",
    "",
  ].join("\n");
}

export type ParsedArgs = { help: true } | { help: false; config: CliConfig };

const OPTIONS = {
  auto: { type: "boolean", short: "a" },
  ipv4: { type: "boolean", short: "4" },
  ipv6: { type: "boolean", short: "6" },
  failure_message: { type: "string", short: "f" },
  "failure-message": { type: "string" },
  timeout: { type: "string", short: "t" },
  verbose: { type: "boolean", short: "v" },
  help: { type: "boolean", short: "h" },
} as const;

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      tokens: true,
      options: OPTIONS,
    });
  } catch (error) {
    throw new CliUsageError(
      error instanceof Error ? error.message : String(error),
    );
  }
}

export function parseCliArgs(argv: string[]): ParsedArgs {
  const { values, tokens } = readArgs(argv);
  if (values.help) {
    return { help: true };
  }

  let chosen: ModeFlag | undefined;
  for (const token of tokens) {
    if (token.kind !== "option" || !isModeFlag(token.name)) {
      continue;
    }
    if (chosen !== undefined && chosen !== token.name) {
      throw new CliUsageError(
        `argument ${MODE_FLAGS[token.name].label}: not allowed with argument ${MODE_FLAGS[chosen].label}`,
      );
    }
    chosen = token.name;
  }

  // Whichever spelling came last wins, same as a repeated flag.
  let failureMessage: string = Defaults.FAILURE_MESSAGE;
  for (const token of tokens) {
    if (
      token.kind === "option" &&
      (token.name === "failure_message" || token.name === "failure-message") &&
      token.value !== undefined
    ) {
      failureMessage = token.value;
    }
  }

  let timeoutMs: number | undefined;
  if (values.timeout !== undefined) {
    if (!/^\d+$/.test(values.timeout) || Number(values.timeout) <= 0) {
      throw new CliUsageError(
        `argument -t/--timeout: invalid positive integer value: '${values.timeout}'`,
      );
    }
    timeoutMs = Number(values.timeout);
  }

  return {
    help: false,
    config: {
      ipVersion: chosen === undefined ? 0 : MODE_FLAGS[chosen].mode,
      failureMessage,
      timeoutMs,
      verbose: values.verbose === true,
    },
  };
}

export interface AddressSource {
  resolveMode(mode: IpMode): Promise<ResolvedAddress | null>;
}

export interface RunDeps {
  stdout?: { write(chunk: string): unknown };
  stderr?: { write(chunk: string): unknown };
  createResolver?: (config: CliConfig) => AddressSource;
}

const defaultResolver = (config: CliConfig): AddressSource =>
  new IpResolver({ timeoutMs: config.timeoutMs });

/** Returns the exit code. Only a bad command line exits non-zero. */
export async function run(argv: string[], deps: RunDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const createResolver = deps.createResolver ?? defaultResolver;

  let parsed: ParsedArgs;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    if (!(error instanceof CliUsageError)) {
      throw error;
    }
    stderr.write(`${usage().split("\n")[0]}\n`);
    stderr.write(`${Defaults.PROGRAM}: error: ${error.message}\n`);
    return 2;
  }

  if (parsed.help) {
    stdout.write(usage());
    return 0;
  }

  const { config } = parsed;
  if (config.verbose) {
    setLogLevel("debug");
  }
  log.debug("Cli", "Resolving", {
    mode: config.ipVersion === 0 ? "auto" : `ipv${config.ipVersion}`,
    timeoutMs: config.timeoutMs,
  });

  const address = await createResolver(config).resolveMode(config.ipVersion);
  stdout.write(`${address ?? config.failureMessage}\n`);
  return 0;
}
