// SPDX-License-Identifier: Apache-2.0

import * as constants from '../../core/constants.js';

export interface TestCaseDocument {
  name: string;
}

export interface TestCaseGroupDocument {
  name: string;
  clusters: string[];
  testcases: TestCaseDocument[];
}

/**
 * A suite as the test runner reads it from the suites directory.
 */
export interface SuiteDefinitionDocument {
  suite: string;
  timeout: string;
  tcGroups: TestCaseGroupDocument[];
}

/**
 * A single-use suite holding one group with the given tests.
 */
export function transientSuiteDefinition(tests: readonly string[]): SuiteDefinitionDocument {
  return {
    suite: constants.TRANSIENT_SUITE_NAME,
    timeout: constants.TRANSIENT_SUITE_TIMEOUT,
    tcGroups: [
      {
        name: constants.TRANSIENT_SUITE_GROUP_NAME,
        clusters: [...constants.TRANSIENT_SUITE_CLUSTERS],
        testcases: tests.map((name: string): TestCaseDocument => ({name})),
      },
    ],
  };
}
