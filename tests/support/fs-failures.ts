import type * as fsPromises from "node:fs/promises";

type FsModule = typeof fsPromises;
export type FailingOperation = "unlink" | "writeFile";

interface PlannedFailure {
  operation: FailingOperation;
  matches: (target: string) => boolean;
  error: NodeJS.ErrnoException;
}

const planned: PlannedFailure[] = [];

/**
 * Make the next matching call fail once with the given errno code.
 */
export function failNextCall(
  operation: FailingOperation,
  matches: (target: string) => boolean,
  code: string,
): void {
  const error: NodeJS.ErrnoException = Object.assign(new Error(`${code}: injected failure`), { code });
  planned.push({ operation, matches, error });
}

export function clearPlannedFailures(): void {
  planned.length = 0;
}

function takeFailure(operation: FailingOperation, target: string): NodeJS.ErrnoException | undefined {
  const index = planned.findIndex((f) => f.operation === operation && f.matches(target));
  if (index === -1) return undefined;
  const [failure] = planned.splice(index, 1);
  return failure?.error;
}

/**
 * Pass-through fs/promises for vi.mock() whose unlink and writeFile honour failNextCall().
 */
export function withPlannedFailures(actual: FsModule): FsModule {
  return {
    ...actual,
    unlink: async (...args: Parameters<FsModule["unlink"]>) => {
      const failure = takeFailure("unlink", String(args[0]));
      if (failure) throw failure;
      return actual.unlink(...args);
    },
    writeFile: async (...args: Parameters<FsModule["writeFile"]>) => {
      const failure = takeFailure("writeFile", String(args[0]));
      if (failure) throw failure;
      return actual.writeFile(...args);
    },
  };
}
