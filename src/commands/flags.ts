// SPDX-License-Identifier: Apache-2.0

import {type Argv} from 'yargs';
import {type CommandFlag} from '../types/flag-types.js';
import {SUITE_ALIAS_NAMES} from '../business/suite/suite-alias.js';
import {RUNNER_SCHEMA_NAMES} from '../business/run-config/runner-schema.js';

/**
 * Command line flags. None declares a default: an option is present in the parsed arguments only when the
 * user typed it, and the built-in defaults are applied by the configuration layer.
 */
export class Flags {
  public static setCommandFlags(y: Argv, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      y.option(flag.name, flag.definition);
    }
  }

  public static readonly namespace: CommandFlag = {
    constName: 'namespace',
    name: 'namespace',
    definition: {
      describe: 'Namespace the operator and clusters are deployed into',
      alias: 'n',
      type: 'string',
    },
  };

  public static readonly kubeconfig: CommandFlag = {
    constName: 'kubeconfig',
    name: 'kubeconfig',
    definition: {
      describe: 'Path to the kubeconfig file',
      alias: 'k',
      type: 'string',
    },
  };

  public static readonly context: CommandFlag = {
    constName: 'context',
    name: 'context',
    definition: {
      describe: 'Kubernetes context, one per cluster role; the last one fills the remaining roles',
      alias: 'c',
      type: 'string',
      array: true,
    },
  };

  public static readonly serviceAccount: CommandFlag = {
    constName: 'serviceAccount',
    name: 'service-account',
    definition: {
      describe: 'Service account the operator runs as',
      alias: 'a',
      type: 'string',
    },
  };

  public static readonly image: CommandFlag = {
    constName: 'image',
    name: 'image',
    definition: {
      describe: 'Operator image',
      alias: 'i',
      type: 'string',
    },
  };

  public static readonly admissionControllerImage: CommandFlag = {
    constName: 'admissionControllerImage',
    name: 'admission-controller-image',
    definition: {
      describe: 'Admission controller image',
      alias: 'I',
      type: 'string',
    },
  };

  public static readonly repo: CommandFlag = {
    constName: 'repo',
    name: 'repo',
    definition: {
      describe: 'Root of the operator repository',
      alias: 'r',
      type: 'string',
    },
  };

  public static readonly verbose: CommandFlag = {
    constName: 'verbose',
    name: 'verbose',
    definition: {
      describe: 'Enable debug logging',
      alias: 'v',
      type: 'boolean',
      default: undefined,
    },
  };

  public static readonly devMode: CommandFlag = {
    constName: 'devMode',
    name: 'dev',
    definition: {
      describe: 'Show stack traces and error causes when the launcher fails',
      type: 'boolean',
      default: undefined,
    },
  };

  public static readonly dockerServer: CommandFlag = {
    constName: 'dockerServer',
    name: 'docker-server',
    definition: {
      describe: 'Docker registry server',
      alias: 'S',
      type: 'string',
    },
  };

  public static readonly dockerUsername: CommandFlag = {
    constName: 'dockerUsername',
    name: 'docker-username',
    definition: {
      describe: 'Docker registry username',
      alias: 'U',
      type: 'string',
    },
  };

  public static readonly dockerPassword: CommandFlag = {
    constName: 'dockerPassword',
    name: 'docker-password',
    definition: {
      describe: 'Docker registry password',
      alias: 'P',
      type: 'string',
    },
  };

  public static readonly storageClass: CommandFlag = {
    constName: 'storageClass',
    name: 'storage-class',
    definition: {
      describe: 'Storage class for persistent volumes',
      alias: 'C',
      type: 'string',
    },
  };

  public static readonly collectLogs: CommandFlag = {
    constName: 'collectLogs',
    name: 'collect-logs',
    definition: {
      describe: 'Collect logs when a test fails',
      alias: 'l',
      type: 'boolean',
      default: undefined,
    },
  };

  public static readonly serverImage: CommandFlag = {
    constName: 'serverImage',
    name: 'server-image',
    definition: {
      describe: 'Database server image',
      type: 'string',
    },
  };

  public static readonly serverUpgradeImage: CommandFlag = {
    constName: 'serverUpgradeImage',
    name: 'server-upgrade-image',
    definition: {
      describe: 'Database server image to upgrade to',
      type: 'string',
    },
  };

  public static readonly syncGatewayImage: CommandFlag = {
    constName: 'syncGatewayImage',
    name: 'sync-gateway-image',
    definition: {
      describe: 'Sync gateway (mobile) image',
      type: 'string',
    },
  };

  public static readonly suite: CommandFlag = {
    constName: 'suite',
    name: 'suite',
    definition: {
      describe: 'Built-in suite to run',
      alias: 's',
      type: 'string',
      choices: SUITE_ALIAS_NAMES,
      conflicts: 'test',
    },
  };

  public static readonly test: CommandFlag = {
    constName: 'test',
    name: 'test',
    definition: {
      describe: 'Test to run; repeat for more than one',
      alias: 't',
      type: 'string',
      array: true,
    },
  };

  public static readonly runnerSchema: CommandFlag = {
    constName: 'runnerSchema',
    name: 'runner-schema',
    definition: {
      describe: 'How the run configuration is passed to the test runner',
      type: 'string',
      choices: RUNNER_SCHEMA_NAMES,
    },
  };

  public static readonly timeout: CommandFlag = {
    constName: 'timeout',
    name: 'timeout',
    definition: {
      describe: 'Timeout passed to the test runner, e.g. 16h',
      type: 'string',
    },
  };

  public static readonly dryRun: CommandFlag = {
    constName: 'dryRun',
    name: 'dry-run',
    definition: {
      describe: 'Print the test runner command instead of running it',
      type: 'boolean',
      default: undefined,
    },
  };

  public static readonly version: CommandFlag = {
    constName: 'version',
    name: 'version',
    definition: {
      describe: 'Show the launcher version',
      type: 'boolean',
      default: undefined,
    },
  };

  public static readonly help: CommandFlag = {
    constName: 'help',
    name: 'help',
    definition: {
      describe: 'Show help',
      alias: 'h',
      type: 'boolean',
      default: undefined,
    },
  };

  public static readonly allFlags: CommandFlag[] = [
    Flags.namespace,
    Flags.kubeconfig,
    Flags.context,
    Flags.serviceAccount,
    Flags.image,
    Flags.admissionControllerImage,
    Flags.repo,
    Flags.verbose,
    Flags.devMode,
    Flags.dockerServer,
    Flags.dockerUsername,
    Flags.dockerPassword,
    Flags.storageClass,
    Flags.collectLogs,
    Flags.serverImage,
    Flags.serverUpgradeImage,
    Flags.syncGatewayImage,
    Flags.suite,
    Flags.test,
    Flags.runnerSchema,
    Flags.timeout,
    Flags.dryRun,
    Flags.version,
    Flags.help,
  ];
}
