// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import {expect} from 'chai';
import {describe, it, beforeEach} from 'mocha';
import {ConfigResolver} from '../../../../src/core/config/config-resolver.js';
import {type EffectiveConfig} from '../../../../src/core/config/effective-config.js';
import {ValidationError} from '../../../../src/data/configuration/api/validation-error.js';
import {DefaultConfigSource} from '../../../../src/data/configuration/impl/default-config-source.js';
import {CliConfigSource} from '../../../../src/data/configuration/impl/cli-config-source.js';
import {DEFAULT_CONFIG} from '../../../../src/core/constants.js';
import {type ConfigKey, type ConfigValue} from '../../../../src/data/schema/model/launcher-config-schema.js';
import {SimpleConfigSourceFixture} from '../../fixtures/simple-config-source.fixture.js';
import {RecordingLogger} from '../../../helpers/recording-logger.js';

const HOME: string = path.resolve('/home/tester');

function staticFile(entries: Partial<Record<ConfigKey, ConfigValue>>): SimpleConfigSourceFixture {
  return new SimpleConfigSourceFixture('StaticFileConfigSource', 100, entries);
}

function problemsOf(action: () => unknown): readonly string[] {
  try {
    action();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.problems;
    }
    throw error;
  }
  expect.fail('expected a ValidationError');
}

describe('ConfigResolver', (): void => {
  let logger: RecordingLogger;
  let resolver: ConfigResolver;
  let defaults: DefaultConfigSource;

  beforeEach((): void => {
    logger = new RecordingLogger();
    resolver = new ConfigResolver(logger, HOME);
    defaults = new DefaultConfigSource(DEFAULT_CONFIG);
  });

  it('resolves the defaults with a repository and a suite', (): void => {
    const config: EffectiveConfig = resolver.resolveSources(
      defaults,
      new CliConfigSource({repo: '/src/operator', suite: 'sanity'}),
    );

    expect(config.namespace).to.equal('default');
    expect(config.kubeConfig).to.equal(path.join(HOME, '.kube', 'config'));
    expect(config.contexts).to.deep.equal([]);
    expect(config.serviceAccount).to.equal('default');
    expect(config.operatorImage).to.equal('couchbase/couchbase-operator:v1');
    expect(config.repository).to.equal(path.resolve('/src/operator'));
    expect(config.selection).to.deep.equal({kind: 'alias', alias: 'sanity'});
    expect(config.docker).to.be.undefined;
    expect(config.runnerSchema).to.equal('flags');
    expect(config.timeout).to.equal('16h');
    expect(config.verbose).to.be.false;
    expect(config.collectLogs).to.be.false;
    expect(config.dryRun).to.be.false;
  });

  describe('precedence', (): void => {
    it('prefers the command line over the static file over the defaults', (): void => {
      const config: EffectiveConfig = resolver.resolveSources(
        defaults,
        staticFile({'namespace': 'from-file', 'image': 'file/operator:1', 'repo': '/file/repo', 'suite': 'p0'}),
        new CliConfigSource({namespace: 'from-cli'}),
      );

      expect(config.namespace).to.equal('from-cli');
      expect(config.operatorImage).to.equal('file/operator:1');
      expect(config.serviceAccount).to.equal('default');
      expect(config.repository).to.equal(path.resolve('/file/repo'));
    });

    it('lets the static file override a default the command line did not supply', (): void => {
      const config: EffectiveConfig = resolver.resolveSources(
        defaults,
        staticFile({'storage-class': 'fast'}),
        new CliConfigSource({'repo': '/r', 'suite': 'p1', 'storage-class': undefined}),
      );

      expect(config.storageClass).to.equal('fast');
    });

    it('replaces a static file suite with command line tests as a whole', (): void => {
      const config: EffectiveConfig = resolver.resolveSources(
        defaults,
        staticFile({repo: '/r', suite: 'sanity'}),
        new CliConfigSource({test: ['TestOne']}),
      );

      expect(config.selection).to.deep.equal({kind: 'tests', tests: ['TestOne']});
    });

    it('logs where every value came from and redacts the docker password', (): void => {
      resolver.resolveSources(
        defaults,
        new CliConfigSource({
          'repo': '/r',
          'suite': 'sanity',
          'docker-server': 'registry.local',
          'docker-username': 'builder',
          'docker-password': 'test-secret',
        }),
      );

      const debug: string[] = logger.messages('debug');
      expect(debug).to.include('option namespace="default" (from DefaultConfigSource)');
      expect(debug).to.include('option repo="/r" (from CliConfigSource)');
      expect(debug).to.include('option docker-password=****** (from CliConfigSource)');
      expect(logger.text()).not.to.contain('test-secret');
    });
  });

  describe('suite selection', (): void => {
    it('requires a suite or tests', (): void => {
      expect(problemsOf((): unknown => resolver.resolveSources(defaults, new CliConfigSource({repo: '/r'})))).to.deep.equal(
        ['one of the options "suite" or "test" is required'],
      );
    });

    it('rejects a source naming both a suite and tests', (): void => {
      expect(
        problemsOf((): unknown =>
          resolver.resolveSources(defaults, staticFile({repo: '/r', suite: 'p0', test: ['TestOne']})),
        ),
      ).to.deep.equal(['options "suite" and "test" are mutually exclusive (both set by StaticFileConfigSource)']);
    });

    it('rejects an unknown alias from the static file', (): void => {
      expect(
        problemsOf((): unknown => resolver.resolveSources(defaults, staticFile({repo: '/r', suite: 'nightly'}))),
      ).to.deep.equal(['unknown suite alias "nightly", expected one of: sanity, p0, p1, crd, upgrade, rbac, ldap']);
    });

    it('rejects an empty test list', (): void => {
      expect(
        problemsOf((): unknown => resolver.resolveSources(defaults, new CliConfigSource({repo: '/r', test: []}))),
      ).to.deep.equal(['option "test" requires at least one test name']);
    });

    it('rejects blank test names', (): void => {
      expect(
        problemsOf((): unknown =>
          resolver.resolveSources(defaults, new CliConfigSource({repo: '/r', test: ['TestOne', ' ']})),
        ),
      ).to.deep.equal(['option "test" must not contain empty test names']);
    });
  });

  describe('docker credentials', (): void => {
    it('names each missing credential once any is set', (): void => {
      expect(
        problemsOf((): unknown =>
          resolver.resolveSources(
            defaults,
            new CliConfigSource({'repo': '/r', 'suite': 'sanity', 'docker-server': 'registry.local'}),
          ),
        ),
      ).to.deep.equal([
        'option "docker-username" is required when docker credentials are set',
        'option "docker-password" is required when docker credentials are set',
      ]);
    });

    it('resolves a complete set', (): void => {
      const config: EffectiveConfig = resolver.resolveSources(
        defaults,
        staticFile({'docker-server': 'registry.local', 'docker-username': 'builder'}),
        new CliConfigSource({'repo': '/r', 'suite': 'sanity', 'docker-password': 'test-secret'}),
      );

      expect(config.docker).to.deep.equal({server: 'registry.local', username: 'builder', password: 'test-secret'});
    });
  });

  it('rejects a blank timeout from the static file', (): void => {
    expect(
      problemsOf((): unknown =>
        resolver.resolveSources(defaults, staticFile({timeout: ''}), new CliConfigSource({repo: '/r', suite: 'p0'})),
      ),
    ).to.deep.equal(['required option "timeout" is unset']);
  });

  it('rejects blank context names', (): void => {
    expect(
      problemsOf((): unknown =>
        resolver.resolveSources(defaults, new CliConfigSource({repo: '/r', suite: 'p0', context: ['kind-a', '']})),
      ),
    ).to.deep.equal(['option "context" must not contain empty context names']);
  });

  it('reports every problem of one pass together', (): void => {
    expect(
      problemsOf((): unknown =>
        resolver.resolveSources(
          defaults,
          new CliConfigSource({'namespace': '', 'docker-username': 'builder', 'runner-schema': 'grpc'}),
        ),
      ),
    ).to.deep.equal([
      'one of the options "suite" or "test" is required',
      'required option "namespace" is unset',
      'required option "repo" is unset',
      'option "docker-server" is required when docker credentials are set',
      'option "docker-password" is required when docker credentials are set',
      'unknown runner schema "grpc", expected one of: flags, config-file, config-file-legacy',
    ]);
  });

  it('includes type problems reported by the sources', (): void => {
    expect(
      problemsOf((): unknown =>
        resolver.resolveSources(defaults, new CliConfigSource({'repo': '/r', 'suite': 'p0', 'verbose': 'yes'})),
      ),
    ).to.deep.equal(['command line option "verbose" must be a boolean']);
  });

  it('summarises a single problem in the error message', (): void => {
    expect((): unknown => resolver.resolveSources(defaults, new CliConfigSource({suite: 'p0'}))).to.throw(
      ValidationError,
      'Invalid configuration: required option "repo" is unset',
    );
  });

  it('expands the home directory in path options', (): void => {
    const config: EffectiveConfig = resolver.resolveSources(
      defaults,
      new CliConfigSource({kubeconfig: '~/clusters/kind.yaml', repo: '~', suite: 'crd'}),
    );

    expect(config.kubeConfig).to.equal(path.join(HOME, 'clusters', 'kind.yaml'));
    expect(config.repository).to.equal(HOME);
  });
});
