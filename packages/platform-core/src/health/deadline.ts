export interface Deadline {
  /** Resolves once the budget has elapsed; stays pending after cancel() */
  readonly expired: Promise<void>;
  cancel(): void;
}

export function createDeadline(ms: number): Deadline {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<void>(resolve => {
    timer = setTimeout(resolve, ms);
  });

  return {
    expired,
    cancel: () => clearTimeout(timer),
  };
}
