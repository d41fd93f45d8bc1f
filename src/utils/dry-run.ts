import { Buffer } from "node:buffer";
import { createTwoFilesPatch } from "diff";
import chalk from "chalk";
import { readFileIfExists, type FileSystem } from "./file-system.js";

export type DryRunOperation =
  | {
      type: "writeFile";
      path: string;
      nextContent: string;
      previousContent: string | null;
    }
  | {
      type: "mkdir";
      path: string;
      options?: { recursive?: boolean };
    }
  | {
      type: "unlink";
      path: string;
    }
  | {
      type: "copyFile";
      from: string;
      to: string;
    };

export class DryRunRecorder {
  private operations: DryRunOperation[] = [];

  record(operation: DryRunOperation): void {
    this.operations.push(operation);
  }

  drain(): DryRunOperation[] {
    const snapshot = this.operations;
    this.operations = [];
    return snapshot;
  }
}

/**
 * Reads pass through to `base`; every write is recorded instead of performed.
 */
export function createDryRunFileSystem(
  base: FileSystem,
  recorder: DryRunRecorder
): Required<FileSystem> {
  function readFile(path: string, encoding: BufferEncoding): Promise<string>;
  function readFile(path: string): Promise<Buffer>;
  function readFile(
    path: string,
    encoding?: BufferEncoding
  ): Promise<string | Buffer> {
    if (encoding) {
      return base.readFile(path, encoding);
    }
    return base.readFile(path);
  }

  return {
    readFile,
    async writeFile(
      path: string,
      data: string | NodeJS.ArrayBufferView,
      options?: { encoding?: BufferEncoding }
    ): Promise<void> {
      const previousContent = await readFileIfExists(base, path);
      const nextContent = formatData(data, options?.encoding);
      recorder.record({
        type: "writeFile",
        path,
        nextContent,
        previousContent
      });
    },
    async mkdir(
      path: string,
      options?: { recursive?: boolean }
    ): Promise<void> {
      recorder.record({ type: "mkdir", path, options });
    },
    stat(path: string) {
      return base.stat(path);
    },
    async unlink(path: string): Promise<void> {
      recorder.record({ type: "unlink", path });
    },
    readdir(path: string): Promise<string[]> {
      return base.readdir(path);
    },
    async copyFile(from: string, to: string): Promise<void> {
      recorder.record({ type: "copyFile", from, to });
    }
  };
}

export function formatDryRunOperations(
  operations: DryRunOperation[]
): string[] {
  if (operations.length === 0) {
    return [chalk.dim("# no filesystem changes")];
  }

  const lines: string[] = [];
  for (const operation of operations) {
    const formatted = formatOperation(operation);
    if (Array.isArray(formatted)) {
      lines.push(...formatted);
    } else {
      lines.push(formatted);
    }
  }
  return lines;
}

function formatOperation(operation: DryRunOperation): string | string[] {
  switch (operation.type) {
    case "mkdir": {
      const recursiveFlag = operation.options?.recursive ? " -p" : "";
      const command = `mkdir${recursiveFlag} ${operation.path}`;
      return renderOperationCommand(command, chalk.cyan, "# ensure");
    }
    case "unlink":
      return renderOperationCommand(`rm ${operation.path}`, chalk.red, "# delete");
    case "copyFile":
      return renderOperationCommand(
        `cp ${operation.from} ${operation.to}`,
        chalk.cyan,
        "# copy"
      );
    case "writeFile": {
      return renderWriteOperation(operation);
    }
    default: {
      const neverOp: never = operation;
      return chalk.dim(`# unknown operation ${String(neverOp)}`);
    }
  }
}

function renderOperationCommand(
  command: string,
  colorize: (value: string) => string,
  detail: string
): string {
  return `${colorize(command)} ${chalk.dim(detail)}`;
}

function describeWriteChange(
  previous: string | null,
  next: string
): "create" | "update" | "noop" {
  if (previous == null) {
    return "create";
  }
  if (previous === next) {
    return "noop";
  }
  return "update";
}

function renderWriteCommand(
  path: string,
  change: "create" | "update" | "noop"
): string {
  const command = `cat > ${path}`;
  if (change === "create") {
    return renderOperationCommand(command, chalk.green, "# create");
  }
  if (change === "update") {
    return renderOperationCommand(command, chalk.yellow, "# update");
  }
  return renderOperationCommand(command, chalk.dim, "# no change");
}

function renderWriteOperation(
  operation: Extract<DryRunOperation, { type: "writeFile" }>
): string[] {
  const change = describeWriteChange(
    operation.previousContent,
    operation.nextContent
  );
  const lines: string[] = [renderWriteCommand(operation.path, change)];
  if (change === "noop") {
    return lines;
  }
  lines.push(
    ...renderUnifiedDiff(
      operation.path,
      operation.previousContent,
      operation.nextContent
    )
  );
  return lines;
}

function renderUnifiedDiff(
  targetPath: string,
  previousContent: string | null,
  nextContent: string
): string[] {
  const oldLabel = previousContent == null ? "/dev/null" : targetPath;
  const patch = createTwoFilesPatch(
    oldLabel,
    targetPath,
    previousContent ?? "",
    nextContent,
    "",
    "",
    { context: 3 }
  );
  const lines: string[] = [];
  for (const line of patch.split("\n")) {
    if (line.length === 0 || line.startsWith("====")) {
      continue;
    }
    if (line.startsWith("---") || line.startsWith("+++")) {
      lines.push(chalk.dim(line));
    } else if (line.startsWith("@@")) {
      lines.push(chalk.cyan(line));
    } else if (line.startsWith("+")) {
      lines.push(chalk.green("+") + line.slice(1));
    } else if (line.startsWith("-")) {
      lines.push(chalk.red("-") + line.slice(1));
    } else {
      lines.push(chalk.dim(line));
    }
  }
  return lines;
}

function formatData(
  data: string | NodeJS.ArrayBufferView,
  encoding: BufferEncoding = "utf8"
): string {
  if (typeof data === "string") {
    return data;
  }
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString(
    encoding
  );
}
