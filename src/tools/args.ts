export type ToolArgs = {
  config?: string;
  debug: boolean;
  host?: string;
  port?: number;
  group?: string;
  positionals: string[];
};

type ValueFlag = "config" | "host" | "port" | "group";

function isValueFlag(name: string): name is ValueFlag {
  return name === "config" || name === "host" || name === "port" || name === "group";
}

/** Flags shared by the command-line tools; anything else is rejected. */
export function parseToolArgs(argv: readonly string[]): ToolArgs {
  const args: ToolArgs = { debug: false, positionals: [] };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      args.positionals.push(arg);
      continue;
    }

    const [name, inline] = arg.slice(2).split("=", 2);
    if (name === "debug") {
      args.debug = inline !== "false";
      continue;
    }
    if (!isValueFlag(name)) throw new Error(`Unknown option --${name}`);

    const value = inline ?? argv[i + 1];
    if (value === undefined || value.startsWith("--")) throw new Error(`--${name} needs a value`);
    if (inline === undefined) i += 1;

    if (name === "port") {
      const port = Number(value);
      if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new Error(`--port must be a port number, got ${value}`);
      }
      args.port = port;
    } else {
      args[name] = value;
    }
  }
  return args;
}
