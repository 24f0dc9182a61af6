// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type PipelineLogger} from './logging/pipeline-logger.js';
import {UserBreak} from './errors/user-break.js';
import {SilentBreak} from './errors/silent-break.js';

@injectable()
export class ErrorHandler {
  private readonly logger: PipelineLogger;

  public constructor(@inject(InjectTokens.PipelineLogger) logger?: PipelineLogger) {
    this.logger = patchInject(logger, InjectTokens.PipelineLogger, this.constructor.name);
  }

  /**
   * Reports the error and sets the exit code; breaks end the process successfully.
   */
  public handle(error: unknown): void {
    const error_ = this.extractBreak(error);
    if (error_ instanceof UserBreak) {
      this.handleUserBreak(error_);
    } else if (error_ instanceof SilentBreak) {
      this.handleSilentBreak(error_);
    } else {
      this.handleError(error);
    }
  }

  private handleUserBreak(userBreak: UserBreak): void {
    this.logger.showUser(userBreak.message);
  }

  private handleSilentBreak(silentBreak: SilentBreak): void {
    this.logger.info(silentBreak.message);
  }

  private handleError(error: unknown): void {
    this.logger.showUserError(error);
    process.exitCode = 1;
  }

  /**
   * Recursively checks if an error is or is caused by a UserBreak
   * Returns the UserBreak or SilentBreak if found, otherwise false
   */
  private extractBreak(error: unknown): UserBreak | SilentBreak | false {
    if (error instanceof UserBreak || error instanceof SilentBreak) {
      return error;
    }
    if (error instanceof Error && error.cause) {
      return this.extractBreak(error.cause);
    }
    return false;
  }
}
