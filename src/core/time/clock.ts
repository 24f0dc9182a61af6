// SPDX-License-Identifier: Apache-2.0

/**
 * Source of the invocation wall-clock time, swapped out by tests.
 */
export interface Clock {
  now(): Date;
}

export const SYSTEM_CLOCK: Clock = {
  now: () => new Date(),
};
