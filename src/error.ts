export class ConfigError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Fatal failure of a pipeline stage. Stops the run; the original failure is kept as `cause`.
 */
export class DeployError extends Error {
  public constructor(
    public readonly stage: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`[${stage}] ${message}`, options);
    this.name = 'DeployError';
  }
}

/**
 * Poll loop ran out of attempts without observing its success condition.
 */
export class PollTimeoutError extends Error {
  public constructor(
    public readonly label: string,
    public readonly attempts: number,
    public readonly elapsedMs: number,
    public readonly lastObserved: string,
  ) {
    super(`${label} timed out after ${attempts} attempts (${elapsedMs} ms), last observed: ${lastObserved}`);
    this.name = 'PollTimeoutError';
  }
}

/**
 * Remote call returned an error result (as opposed to failing in transport).
 */
export class RemoteError extends Error {
  public constructor(
    public readonly method: string,
    message: string,
  ) {
    super(`${method}: ${message}`);
    this.name = 'RemoteError';
  }
}

export const describeError = (e: unknown): string => {
  return e instanceof Error ? e.message : String(e);
};

/**
 * Runs one remote step of a stage; any failure becomes a {@link DeployError} for that stage.
 */
export const runStep = async <T>(stage: string, message: string, step: () => Promise<T>): Promise<T> => {
  try {
    return await step();
  } catch (e) {
    if (e instanceof DeployError) {
      throw e;
    }
    throw new DeployError(stage, `${message}: ${describeError(e)}`, { cause: e });
  }
};
