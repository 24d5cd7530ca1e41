import Bottleneck from "bottleneck";

/**
 * GDELT asks for no more than one DOC API request every 5 seconds.
 * One call at a time, spaced by at least minTime ms.
 */
export function createGdeltLimiter(minTime = 5_000): Bottleneck {
  return new Bottleneck({
    maxConcurrent: 1,
    minTime,
  });
}
