export type CliCommand =
  | { command: "ingest"; pattern: string; maxTokens?: number; overlap?: number; prune: boolean }
  | { command: "search"; query: string; topK?: number }
  | { command: "remove"; filename: string }
  | { command: "agent"; message: string }
  | { command: "help" };

export const USAGE = [
  "Usage: tsx src/cli/index.ts <command> [options]",
  "",
  "  ingest <pattern> [--max-tokens N] [--overlap N] [--prune]",
  "  search <query> [--top-k N]",
  "  remove <filename>",
  "  agent <message>",
].join("\n");

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const FLAGS_BY_COMMAND: Record<string, string[]> = {
  ingest: ["--max-tokens", "--overlap", "--prune"],
  search: ["--top-k"],
  remove: [],
  agent: [],
};

const VALUE_FLAGS = new Set(["--max-tokens", "--overlap", "--top-k"]);

const parseInteger = (flag: string, value: string | undefined): number => {
  if (value === undefined || !/^-?\d+$/.test(value)) {
    throw new CliUsageError(`${flag} expects an integer (got ${value ?? "nothing"})`);
  }
  return Number.parseInt(value, 10);
};

export const parseCliArgs = (argv: string[]): CliCommand => {
  const [command, ...rest] = argv;
  if (!command || command === "--help" || command === "-h" || command === "help") {
    return { command: "help" };
  }

  const allowed = FLAGS_BY_COMMAND[command];
  if (!allowed) throw new CliUsageError(`Unknown command: ${command}`);

  const positional: string[] = [];
  const values = new Map<string, string | undefined>();
  let prune = false;

  for (let i = 0; i < rest.length; i += 1) {
    const token = rest[i] ?? "";
    if (!token.startsWith("--")) {
      positional.push(token);
      continue;
    }

    const [flag = token, inline] = token.split("=", 2);
    if (!allowed.includes(flag)) throw new CliUsageError(`Unknown option for ${command}: ${flag}`);

    if (VALUE_FLAGS.has(flag)) {
      if (inline !== undefined) {
        values.set(flag, inline);
      } else {
        values.set(flag, rest[i + 1]);
        i += 1;
      }
    } else if (flag === "--prune") {
      prune = true;
    }
  }

  const intFlag = (flag: string) =>
    values.has(flag) ? parseInteger(flag, values.get(flag)) : undefined;
  const text = positional.join(" ").trim();

  switch (command) {
    case "ingest":
      if (!text) throw new CliUsageError("ingest requires a file pattern");
      return {
        command: "ingest",
        pattern: text,
        maxTokens: intFlag("--max-tokens"),
        overlap: intFlag("--overlap"),
        prune,
      };
    case "search":
      if (!text) throw new CliUsageError("search requires a query");
      return { command: "search", query: text, topK: intFlag("--top-k") };
    case "remove":
      if (!text) throw new CliUsageError("remove requires a filename");
      return { command: "remove", filename: text };
    default:
      if (!text) throw new CliUsageError("agent requires a message");
      return { command: "agent", message: text };
  }
};
