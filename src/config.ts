/**
 * Configuration - Policy and audit log locations
 *
 * Defaults can be overridden through the environment:
 *   RPC_POLICY_DIR          policy directory (default /etc/qubes/policy.d)
 *   RPC_POLICY_INCLUDE_DIR  include directory (default <policy dir>/include)
 *   RPC_POLICY_AUDIT_LOG    audit log file (default ~/.rpc-policy/audit.log)
 *   RPC_POLICY_AUDIT        set to 0 to disable the audit log
 */

import * as path from 'path';
import { PolicyEditorConfig } from './types';
import { DEFAULT_AUDIT_LOG, DEFAULT_AUDIT_MAX_SIZE } from './audit-logger';

export const DEFAULT_POLICY_DIR = '/etc/qubes/policy.d';
export const INCLUDE_DIR_NAME = 'include';

export type Environment = Record<string, string | undefined>;

export function loadConfig(env: Environment = process.env): PolicyEditorConfig {
  const dir = nonEmpty(env.RPC_POLICY_DIR) ?? DEFAULT_POLICY_DIR;

  return {
    policy: {
      dir,
      includeDir: nonEmpty(env.RPC_POLICY_INCLUDE_DIR) ?? path.join(dir, INCLUDE_DIR_NAME)
    },
    audit: {
      enabled: env.RPC_POLICY_AUDIT !== '0',
      path: nonEmpty(env.RPC_POLICY_AUDIT_LOG) ?? DEFAULT_AUDIT_LOG,
      maxSize: DEFAULT_AUDIT_MAX_SIZE
    }
  };
}

/**
 * Point the config at another policy directory. The include directory
 * follows unless it was set explicitly.
 */
export function withPolicyDir(config: PolicyEditorConfig, dir: string, env: Environment = process.env): PolicyEditorConfig {
  return {
    ...config,
    policy: {
      dir,
      includeDir: nonEmpty(env.RPC_POLICY_INCLUDE_DIR) ?? path.join(dir, INCLUDE_DIR_NAME)
    }
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}
