/**
 * Serializes async tasks so each one observes the effects of the previous.
 */
export type SerialQueue = {
  run: <T>(task: () => T | Promise<T>) => Promise<T>;
  size: () => number;
};

export function createSerialQueue(): SerialQueue {
  let tail: Promise<unknown> = Promise.resolve();
  let pending = 0;
  return {
    run: <T>(task: () => T | Promise<T>): Promise<T> => {
      pending += 1;
      const next = tail.then(task, task);
      tail = next.then(
        () => undefined,
        () => undefined
      );
      return next.finally(() => {
        pending -= 1;
      });
    },
    size: () => pending
  };
}
