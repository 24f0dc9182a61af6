// SPDX-License-Identifier: Apache-2.0

/** Parsed command line, keyed by flag name (both kebab and camel case) */
export type ArgvStruct = {_: (string | number)[]} & Record<string, unknown>;
