// SPDX-License-Identifier: Apache-2.0

export interface PipelineLogger {
  setDevMode(developmentMode: boolean): void;

  setLogLevel(level: string): void;

  nextTraceId(): void;

  prepMeta(meta?: Record<string, unknown>): Record<string, unknown>;

  showUser(message: string, ...arguments_: unknown[]): void;

  showUserError(error: unknown): void;

  error(message: string, ...arguments_: unknown[]): void;

  warn(message: string, ...arguments_: unknown[]): void;

  info(message: string, ...arguments_: unknown[]): void;

  debug(message: string, ...arguments_: unknown[]): void;

  showList(title: string, items: string[]): void;
}
