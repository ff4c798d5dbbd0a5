// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {RunnerExecutionBuilder} from '../../../../../src/integration/runner/execution/runner-execution-builder.js';
import {type RunnerCommand} from '../../../../../src/integration/runner/execution/runner-command.js';
import {type RunnerRequest} from '../../../../../src/integration/runner/request/runner-request.js';
import {TestRunRequest} from '../../../../../src/integration/runner/request/test-run-request.js';
import {ClusterEndpointsRequest} from '../../../../../src/integration/runner/request/cluster-endpoints-request.js';
import {FlagsRunConfigRequest} from '../../../../../src/integration/runner/request/flags-run-config-request.js';
import {ConfigFileRunConfigRequest} from '../../../../../src/integration/runner/request/config-file-run-config-request.js';
import {LogCollectionRequest} from '../../../../../src/integration/runner/request/log-collection-request.js';
import {resolveClusterEndpoints} from '../../../../../src/business/run-config/cluster-endpoint.js';
import {buildRunConfigDocument, type RunConfigDocument} from '../../../../../src/business/run-config/run-config-document.js';
import {RUNNER_SCHEMAS} from '../../../../../src/business/run-config/runner-schema.js';
import {effectiveConfig} from '../../../../helpers/effective-config-fixture.js';

function build(request: RunnerRequest): RunnerCommand {
  const builder: RunnerExecutionBuilder = new RunnerExecutionBuilder().executable('go');
  request.apply(builder);
  return builder.build();
}

describe('RunnerRequests', (): void => {
  it('TestRunRequest adds the shared test options and the repository variable', (): void => {
    const command: RunnerCommand = build(
      new TestRunRequest({
        testPackage: 'example.com/operator/test/e2e',
        entrypoint: 'TestOperator',
        timeout: '2h',
        repository: '/src/operator',
      }),
    );

    expect(command.arguments).to.deep.equal([
      'test',
      'example.com/operator/test/e2e',
      '-run',
      'TestOperator',
      '-v',
      '-race',
      '-timeout',
      '2h',
    ]);
    expect(command.environmentOverlay).to.deep.equal({TESTDIR: '/src/operator'});
  });

  it('ClusterEndpointsRequest numbers each role and adds contexts after them', (): void => {
    const command: RunnerCommand = build(
      new ClusterEndpointsRequest(resolveClusterEndpoints('/kube/config', ['kind-a'], 'ci')),
    );

    expect(command.arguments).to.deep.equal([
      '-kubeconfig1',
      '/kube/config',
      '-namespace1',
      'ci',
      '-kubeconfig2',
      '/kube/config',
      '-namespace2',
      'remote',
      '-context1',
      'kind-a',
      '-context2',
      'kind-a',
    ]);
  });

  it('ClusterEndpointsRequest leaves contexts out when none were given', (): void => {
    const command: RunnerCommand = build(new ClusterEndpointsRequest(resolveClusterEndpoints('/kube/config', [], 'ci')));

    expect(command.arguments).to.deep.equal([
      '-kubeconfig1',
      '/kube/config',
      '-namespace1',
      'ci',
      '-kubeconfig2',
      '/kube/config',
      '-namespace2',
      'remote',
    ]);
  });

  it('FlagsRunConfigRequest adds docker credentials when present', (): void => {
    const document: RunConfigDocument = buildRunConfigDocument(
      effectiveConfig({
        storageClass: '',
        docker: {server: 'registry.local', username: 'builder', password: 'test-secret'},
      }),
      'TestRBAC',
      RUNNER_SCHEMAS.flags,
      [],
    );

    const command: RunnerCommand = build(new FlagsRunConfigRequest(document));

    expect(command.arguments.slice(-8)).to.deep.equal([
      '-suite',
      'TestRBAC',
      '-docker-server',
      'registry.local',
      '-docker-username',
      'builder',
      '-docker-password',
      'test-secret',
    ]);
    expect(command.arguments).not.to.include('-storage-class');
    expect(command.toString()).not.to.contain('test-secret');
  });

  it('ConfigFileRunConfigRequest passes the file path', (): void => {
    expect(build(new ConfigFileRunConfigRequest('/tmp/e2e-run-0a1b2c3d.yaml')).arguments).to.deep.equal([
      '-config',
      '/tmp/e2e-run-0a1b2c3d.yaml',
    ]);
  });

  it('LogCollectionRequest adds the flag only when requested', (): void => {
    expect(build(new LogCollectionRequest(true)).arguments).to.deep.equal(['-collect-logs']);
    expect(build(new LogCollectionRequest(false)).arguments).to.deep.equal([]);
  });
});
