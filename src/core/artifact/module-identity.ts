// SPDX-License-Identifier: Apache-2.0

/**
 * Identity of the build module the charts belong to.
 */
export interface ModuleIdentity {
  readonly name: string;
  readonly version?: string;
}
