/**
 * Runs tasks one after another, in call order. A rejected task does not
 * stall the tasks queued behind it.
 */
export const createSerialQueue = () => {
  let tail: Promise<unknown> = Promise.resolve();

  return {
    run<T>(task: () => Promise<T>): Promise<T> {
      const result = tail.then(task);

      tail = result.then(
        () => undefined,
        () => undefined,
      );

      return result;
    },
  };
};

export type SerialQueue = ReturnType<typeof createSerialQueue>;
