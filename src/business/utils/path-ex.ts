// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';

export class PathEx {
  /**
   * Joins the given paths. This is a wrapper around path.join. It is recommended to only use this when you are dealing
   * with part of a path that is not a complete path reference on its own.
   *
   * This method is not safe unless literals are used as parameters. Chart roots and output directories come from the
   * build configuration, which is trusted input.
   * @param paths
   */
  public static join(...paths: string[]): string {
    // nosemgrep: path-join-resolve-traversal
    return path.normalize(path.join(...paths));
  }

  /**
   * Resolves the given paths. This is a wrapper around path.resolve.
   * @param paths
   */
  public static resolve(...paths: string[]): string {
    // nosemgrep: path-join-resolve-traversal
    return path.resolve(...paths);
  }

  /**
   * Resolves `target` against `baseDirectory` unless it is already absolute.
   */
  public static resolveAgainst(baseDirectory: string, target: string): string {
    return path.isAbsolute(target) ? path.normalize(target) : PathEx.resolve(baseDirectory, target);
  }

  /**
   * The path of `target` relative to `baseDirectory`, always with forward slashes so that it can be matched against
   * glob patterns on every platform.
   */
  public static relativePosix(baseDirectory: string, target: string): string {
    return path.relative(baseDirectory, target).split(path.sep).join('/');
  }
}
