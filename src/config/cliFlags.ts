import { ConfigurationError } from "../domain/errors.js";
import { CliFlags } from "./runtimeConfig.js";

export const USAGE = `Usage: lecture-notes [options]

Builds the LaTeX lecture notes for one module of a course.

Options:
  --metadata <file>   Course metadata JSON (default: $METADATA_FILE)
  --topic <n>         1-based module index (default: $TOPIC_NUMBER)
  --overwrite         Re-run every stage, ignoring existing artifacts
  --skip_load         Skip transcript embedding (index must already exist)
  --skip_call         Skip section generation (fragments must already exist)
  --skip_generate     Skip document assembly (merged document must already exist)
  -h, --help          Show this message`;

export interface ParsedCli {
  help: boolean;
  flags: CliFlags;
}

export function parseCliFlags(args: string[]): ParsedCli {
  const flags: CliFlags = {};
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = normalizeFlag(args[i]);
    switch (arg) {
      case "--help":
      case "-h":
        help = true;
        break;
      case "--overwrite":
        flags.overwrite = true;
        break;
      case "--skip_load":
        flags.skipLoad = true;
        break;
      case "--skip_call":
        flags.skipCall = true;
        break;
      case "--skip_generate":
        flags.skipGenerate = true;
        break;
      case "--metadata":
        flags.metadataFile = requireValue(arg, args[++i]);
        break;
      case "--topic":
        flags.topicNumber = requireValue(arg, args[++i]);
        break;
      default:
        throw new ConfigurationError(`Unknown argument: ${args[i]}`);
    }
  }

  return { help, flags };
}

function normalizeFlag(arg: string): string {
  return arg.startsWith("--") ? `--${arg.slice(2).replace(/-/g, "_")}` : arg;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("-")) {
    throw new ConfigurationError(`${flag} requires a value.`);
  }
  return value;
}
