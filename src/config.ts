export type EditorConfig = {
  filename: string | null;
  defaultFilename: string;
  // status bar, message line, help line
  reservedRows: number;
  showHelp: boolean;
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = "usage: linedit [file]";

export function resolveConfig(
  argv: readonly string[],
  env: Record<string, string | undefined>,
): EditorConfig {
  let filename: string | null = null;
  let showHelp = false;

  for (const arg of argv) {
    if (arg === "-h" || arg === "--help") {
      showHelp = true;
    } else if (arg.startsWith("-") && arg !== "-") {
      throw new UsageError(`unknown option: ${arg}`);
    } else if (filename === null) {
      filename = arg;
    } else {
      throw new UsageError(`unexpected argument: ${arg}`);
    }
  }

  return {
    filename,
    defaultFilename: env.LINEDIT_DEFAULT_NAME || "untitled.txt",
    reservedRows: 3,
    showHelp,
  };
}
