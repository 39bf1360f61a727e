/**
 * Time source shared by the sampler and the controller.
 * Injected so cycles can run against a virtual clock in tests.
 */
import { type Sleep, sleep } from "./retry/index.js";

export type Clock = Readonly<{
  /** Current time in epoch ms */
  now: () => number;
  sleep: Sleep;
}>;

/**
 * Wall clock backed by Date.now() and setTimeout.
 */
export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};
