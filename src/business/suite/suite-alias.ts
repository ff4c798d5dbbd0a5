// SPDX-License-Identifier: Apache-2.0

/**
 * Short names for the built-in suites and the suite identifier each one stands for.
 */
export const SUITE_ALIASES = {
  sanity: 'TestSanity',
  p0: 'TestP0',
  p1: 'TestP1',
  crd: 'TestCRDValidation',
  upgrade: 'TestUpgrade',
  rbac: 'TestRBAC',
  ldap: 'TestLDAP',
} as const;

export type SuiteAlias = keyof typeof SUITE_ALIASES;

export type SuiteIdentifier = (typeof SUITE_ALIASES)[SuiteAlias];

export const SUITE_ALIAS_NAMES: readonly SuiteAlias[] = Object.keys(SUITE_ALIASES).filter(isSuiteAlias);

export function isSuiteAlias(value: string): value is SuiteAlias {
  return Object.hasOwn(SUITE_ALIASES, value);
}
