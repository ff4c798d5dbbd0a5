// SPDX-License-Identifier: Apache-2.0

import {type RunnerRequest} from './runner-request.js';
import {type RunnerExecutionBuilder} from '../execution/runner-execution-builder.js';
import {type RunConfigDocument} from '../../../business/run-config/run-config-document.js';

/**
 * The run configuration flattened into the discrete options older runners take.
 */
export class FlagsRunConfigRequest implements RunnerRequest {
  public constructor(private readonly document: RunConfigDocument) {}

  public apply(builder: RunnerExecutionBuilder): void {
    builder
      .argument('operator-image', this.document.operatorImage)
      .optionalArgument('admission-image', this.document.admissionControllerImage)
      .optionalArgument('server-image', this.document.serverImage)
      .optionalArgument('server-image-upgrade', this.document.serverImageUpgrade)
      .optionalArgument('mobile-image', this.document.mobileImage)
      .optionalArgument('storage-class', this.document.storageClassName)
      .argument('suite', this.document.suite);

    if (this.document.docker) {
      builder
        .argument('docker-server', this.document.docker.server)
        .argument('docker-username', this.document.docker.username)
        .secretArgument('docker-password', this.document.docker.password);
    }
  }
}
