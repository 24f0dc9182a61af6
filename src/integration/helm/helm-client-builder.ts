// SPDX-License-Identifier: Apache-2.0

import {type HelmClient} from './helm-client.js';

/**
 * HelmClientBuilder is used to construct instances of HelmClient. This interface defines the standard
 * methods which all HelmClient builders must implement.
 *
 * @see HelmClient
 */
export interface HelmClientBuilder {
  /**
   * Sets the helm executable for the HelmClient instance.
   *
   * @param helmExecutable the path to the helm executable, or its name when it is on the PATH.
   * @returns the HelmClientBuilder instance.
   */
  helmExecutable(helmExecutable: string): HelmClientBuilder;

  /**
   * Sets the working directory for the HelmClient instance.
   * @param workingDirectory the working directory.
   * @returns the HelmClientBuilder instance.
   * @implNote The working directory is set to the current directory if not explicitly provided.
   */
  workingDirectory(workingDirectory: string): HelmClientBuilder;

  /**
   * Constructs an instance of the HelmClient with the provided configuration.
   *
   * @returns the HelmClient instance.
   * @throws ConfigurationError if the HelmClient instance cannot be constructed.
   */
  build(): HelmClient;
}
