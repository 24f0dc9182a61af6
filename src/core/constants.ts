// SPDX-License-Identifier: Apache-2.0

import {type ListrLogger} from 'listr2';
import os from 'node:os';
import {PathEx} from '../business/utils/path-ex.js';

// -------------------- helm-pipeline related constants -------------------------------------------------------------
export const PIPELINE_HOME_DIR =
  process.env.HELM_PIPELINE_HOME || PathEx.join(process.env.HOME || os.homedir(), '.helm-pipeline');
export const PIPELINE_LOGS_DIR = PathEx.join(PIPELINE_HOME_DIR, 'logs');
export const PIPELINE_LOG_FILE = 'helm-pipeline.log';
export const ENV_PREFIX = 'HELM_PIPELINE';
export const HELM = 'helm';

// -------------------- chart related constants ---------------------------------------------------------------------
export const CHART_DESCRIPTOR_FILE = 'Chart.yaml';
export const SNAPSHOT_SUFFIX = '-SNAPSHOT';
export const SNAPSHOT_QUALIFIER = 'SNAPSHOT';
export const DEFAULT_TIMESTAMP_FORMAT = 'yyyyMMddHHmmss';
export const STDIN_SENTINEL = '-';

// relative to the project directory
export const DEFAULT_CHART_DIRECTORY = PathEx.join('src', 'main', 'helm');
export const DEFAULT_OUTPUT_DIRECTORY = PathEx.join('target', 'helm', 'repo');
export const DEFAULT_PLACEHOLDER_ARTIFACT_PATH = PathEx.join('target', 'helm.placeholder.txt');
export const DEFAULT_ARTIFACT_REGISTRY_FILE = PathEx.join('target', 'helm.artifact.json');

export const LISTR_DEFAULT_RENDERER_OPTION: {collapseSubtasks: boolean; logger?: ListrLogger} = {
  collapseSubtasks: false,
};
