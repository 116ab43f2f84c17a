/**
 * Rule Formatter - Renders parsed rules back into policy syntax
 *
 * Used for rules built through structured edits; untouched lines keep
 * their loaded text.
 */

import {
  Action,
  ActionParameter,
  ActionType,
  ArgumentKind,
  ArgumentSpecifier,
  QubeSpecifier,
  QubeSpecifierKind,
  Rule,
  SERVICE_WILDCARD,
  ServiceSpecifier
} from './types';

export function formatService(service: ServiceSpecifier): string {
  return service.kind === 'wildcard' ? SERVICE_WILDCARD : service.name;
}

export function formatArgument(argument: ArgumentSpecifier): string {
  switch (argument.kind) {
    case ArgumentKind.EMPTY:
      return '+';
    case ArgumentKind.ANY:
      return '*';
    case ArgumentKind.SPECIFIC:
      return `+${argument.text}`;
    default: {
      const unreachable: never = argument;
      throw new Error(`Unhandled argument specifier: ${JSON.stringify(unreachable)}`);
    }
  }
}

export function formatQubeSpecifier(spec: QubeSpecifier): string {
  switch (spec.kind) {
    case QubeSpecifierKind.LITERAL:
      return spec.name;
    case QubeSpecifierKind.ADMIN_VM:
      return '@adminvm';
    case QubeSpecifierKind.ANY_VM:
      return '@anyvm';
    case QubeSpecifierKind.DEFAULT:
      return '@default';
    case QubeSpecifierKind.DISPVM:
      return '@dispvm';
    case QubeSpecifierKind.DISPVM_NAMED:
      return `@dispvm:${spec.name}`;
    case QubeSpecifierKind.DISPVM_BY_TAG:
      return `@dispvm:@tag:${spec.tag}`;
    case QubeSpecifierKind.TAG:
      return `@tag:${spec.tag}`;
    case QubeSpecifierKind.TYPE:
      return `@type:${spec.typeName}`;
    default: {
      const unreachable: never = spec;
      throw new Error(`Unhandled qube specifier: ${JSON.stringify(unreachable)}`);
    }
  }
}

function formatParams(params: ActionParameter[]): string[] {
  return params.map(param => `${param.key}=${param.value}`);
}

/**
 * Render an action with target/default_target first, then the other
 * parameters in insertion order
 */
export function formatAction(action: Action): string {
  switch (action.type) {
    case ActionType.DENY:
      return 'deny';
    case ActionType.ALLOW: {
      const parts = ['allow'];
      if (action.target) {
        parts.push(`target=${formatQubeSpecifier(action.target)}`);
      }
      return [...parts, ...formatParams(action.params)].join(' ');
    }
    case ActionType.ASK: {
      const parts = ['ask'];
      if (action.defaultTarget) {
        parts.push(`default_target=${formatQubeSpecifier(action.defaultTarget)}`);
      }
      return [...parts, ...formatParams(action.params)].join(' ');
    }
    default: {
      const unreachable: never = action;
      throw new Error(`Unhandled action: ${JSON.stringify(unreachable)}`);
    }
  }
}

export function formatRule(rule: Rule): string {
  return [
    formatService(rule.service),
    formatArgument(rule.argument),
    formatQubeSpecifier(rule.source),
    formatQubeSpecifier(rule.destination),
    formatAction(rule.action)
  ].join(' ');
}

/**
 * Key identifying a rule's meaning: two rules with the same key are
 * duplicates regardless of spacing or parameter order
 */
export function ruleKey(rule: Rule): string {
  const action = rule.action;
  const params = action.type === ActionType.DENY
    ? []
    : [...action.params].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  const normalized: Action = action.type === ActionType.DENY
    ? action
    : { ...action, params };

  return [
    formatService(rule.service),
    formatArgument(rule.argument),
    formatQubeSpecifier(rule.source),
    formatQubeSpecifier(rule.destination),
    formatAction(normalized)
  ].join(' ');
}
