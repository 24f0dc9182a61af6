// SPDX-License-Identifier: Apache-2.0

import {fileURLToPath} from 'node:url';
import path from 'node:path';
import fs from 'node:fs';
import {PathEx} from './src/business/utils/path-ex.js';

/**
 * The version of helm-pipeline, read from its package.json (next to this file, or one level up once compiled to dist).
 */
export function getPipelineVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }

  const __filename: string = fileURLToPath(import.meta.url);
  const __dirname: string = path.dirname(__filename);

  for (const candidate of ['./package.json', '../package.json']) {
    const packageJsonPath: string = PathEx.resolve(__dirname, candidate);
    if (fs.existsSync(packageJsonPath)) {
      const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
      if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
        return String(packageJson.version);
      }
    }
  }
  return 'unknown';
}
