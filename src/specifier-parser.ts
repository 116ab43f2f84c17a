/**
 * Specifier Parser - Validates the individual fields of a policy rule
 *
 * Each method takes the token(s) of one field and returns either the parsed
 * value or the diagnostics describing why the field is invalid.
 */

import {
  Action,
  ActionParameter,
  ActionType,
  ArgumentKind,
  ArgumentSpecifier,
  Diagnostic,
  FieldResult,
  QubeSpecifier,
  QubeSpecifierKind,
  SERVICE_WILDCARD,
  ServiceSpecifier,
  SpecifierPosition,
  Token
} from './types';
import { createDiagnostic, spanOf, spanOfTokens } from './diagnostics';
import { formatQubeSpecifier } from './rule-formatter';

const SERVICE_NAME = /^[A-Za-z0-9_-]+(\.[A-Za-z0-9_-]+)+$/;
const QUBE_NAME = /^[A-Za-z0-9-]+$/;
const TAG_NAME = /^[A-Za-z0-9_.:-]+$/;
const TYPE_NAME = /^[A-Za-z0-9_-]+$/;

const TARGET_PARAM = 'target';
const DEFAULT_TARGET_PARAM = 'default_target';

/**
 * Positions in which each kind of qube specifier may not appear.
 * Adding a kind without an entry here fails to compile.
 */
export const ILLEGAL_POSITIONS: Record<QubeSpecifierKind, readonly SpecifierPosition[]> = {
  [QubeSpecifierKind.LITERAL]: [],
  [QubeSpecifierKind.ADMIN_VM]: [],
  [QubeSpecifierKind.ANY_VM]: [],
  [QubeSpecifierKind.DEFAULT]: [SpecifierPosition.SOURCE],
  [QubeSpecifierKind.DISPVM]: [SpecifierPosition.SOURCE],
  [QubeSpecifierKind.DISPVM_NAMED]: [],
  [QubeSpecifierKind.DISPVM_BY_TAG]: [SpecifierPosition.PARAMETER],
  [QubeSpecifierKind.TAG]: [SpecifierPosition.PARAMETER],
  [QubeSpecifierKind.TYPE]: [SpecifierPosition.PARAMETER]
};

const POSITION_LABELS: Record<SpecifierPosition, string> = {
  [SpecifierPosition.SOURCE]: 'source',
  [SpecifierPosition.DESTINATION]: 'destination',
  [SpecifierPosition.PARAMETER]: 'parameter value'
};

export function isLegalIn(spec: QubeSpecifier, position: SpecifierPosition): boolean {
  return !ILLEGAL_POSITIONS[spec.kind].includes(position);
}

export function toActionType(keyword: string): ActionType | undefined {
  switch (keyword) {
    case ActionType.ALLOW:
      return ActionType.ALLOW;
    case ActionType.DENY:
      return ActionType.DENY;
    case ActionType.ASK:
      return ActionType.ASK;
    default:
      return undefined;
  }
}

export class SpecifierParser {
  /**
   * Parse the service field: '*' or component.Name
   */
  parseService(token: Token, line: number): FieldResult<ServiceSpecifier> {
    if (token.value === SERVICE_WILDCARD) {
      return { ok: true, value: { kind: 'wildcard' } };
    }

    if (!SERVICE_NAME.test(token.value)) {
      return this.fail(createDiagnostic(
        'InvalidServiceName',
        line,
        spanOf(token),
        `Invalid service name "${token.value}": expected "*" or a dotted name such as qubes.Filecopy`
      ));
    }

    return { ok: true, value: { kind: 'name', name: token.value } };
  }

  /**
   * Parse the argument field: '+', '*' or '+argument'
   */
  parseArgument(token: Token, line: number): FieldResult<ArgumentSpecifier> {
    const value = token.value;

    if (value === '+') {
      return { ok: true, value: { kind: ArgumentKind.EMPTY } };
    }
    if (value === '*') {
      return { ok: true, value: { kind: ArgumentKind.ANY } };
    }
    if (value.startsWith('+') && value.length > 1) {
      return { ok: true, value: { kind: ArgumentKind.SPECIFIC, text: value.substring(1) } };
    }

    return this.fail(createDiagnostic(
      'InvalidArgumentSyntax',
      line,
      spanOf(token),
      `Invalid argument "${value}": expected "*", "+" or "+argument"`
    ));
  }

  /**
   * Parse a qube specifier and check that it may appear in the given position
   */
  parseQube(token: Token, line: number, position: SpecifierPosition): FieldResult<QubeSpecifier> {
    const result = this.readQube(token, line);
    if (!result.ok) {
      return result;
    }

    const spec = result.value;
    if (!isLegalIn(spec, position)) {
      const kind = `${spec.kind}IllegalAs${position}` as const;
      return this.fail(createDiagnostic(
        kind,
        line,
        spanOf(token),
        `"${formatQubeSpecifier(spec)}" is not allowed as ${POSITION_LABELS[position]}`
      ));
    }

    return result;
  }

  /**
   * Parse the action keyword and its KEY=VALUE parameters
   */
  parseAction(actionToken: Token, params: Token[], line: number): FieldResult<Action> {
    const type = toActionType(actionToken.value);
    if (type === undefined) {
      return this.fail(createDiagnostic(
        'UnknownAction',
        line,
        spanOf(actionToken),
        `Unknown action "${actionToken.value}": expected allow, deny or ask`
      ));
    }

    switch (type) {
      case ActionType.DENY:
        if (params.length > 0) {
          return this.fail(createDiagnostic(
            'UnexpectedParametersForDeny',
            line,
            spanOfTokens(params),
            'The deny action does not take parameters'
          ));
        }
        return { ok: true, value: { type: ActionType.DENY } };

      case ActionType.ALLOW: {
        const result = this.parseParameters(type, params, line);
        if (!result.ok) {
          return result;
        }
        return {
          ok: true,
          value: { type: ActionType.ALLOW, target: result.value.target, params: result.value.params }
        };
      }

      case ActionType.ASK: {
        const result = this.parseParameters(type, params, line);
        if (!result.ok) {
          return result;
        }
        return {
          ok: true,
          value: { type: ActionType.ASK, defaultTarget: result.value.target, params: result.value.params }
        };
      }

      default: {
        const unreachable: never = type;
        throw new Error(`Unhandled action type: ${String(unreachable)}`);
      }
    }
  }

  private parseParameters(
    type: ActionType.ALLOW | ActionType.ASK,
    tokens: Token[],
    line: number
  ): FieldResult<{ target?: QubeSpecifier; params: ActionParameter[] }> {
    const diagnostics: Diagnostic[] = [];
    const params: ActionParameter[] = [];
    const seen = new Set<string>();
    const targetKey = type === ActionType.ALLOW ? TARGET_PARAM : DEFAULT_TARGET_PARAM;
    const otherKey = type === ActionType.ALLOW ? DEFAULT_TARGET_PARAM : TARGET_PARAM;
    let target: QubeSpecifier | undefined;

    for (const token of tokens) {
      const separator = token.value.indexOf('=');
      if (separator <= 0) {
        diagnostics.push(createDiagnostic(
          'MalformedParameter',
          line,
          spanOf(token),
          `Invalid parameter "${token.value}": expected KEY=VALUE`
        ));
        continue;
      }

      const key = token.value.substring(0, separator);
      const value = token.value.substring(separator + 1);

      if (seen.has(key)) {
        diagnostics.push(createDiagnostic(
          'DuplicateParameter',
          line,
          spanOf(token),
          `Parameter "${key}" is given more than once`
        ));
        continue;
      }
      seen.add(key);

      if (key === otherKey) {
        diagnostics.push(createDiagnostic(
          'ParameterNotApplicable',
          line,
          spanOf(token),
          `Parameter "${key}" is not valid for the ${type} action (use ${targetKey}=)`
        ));
        continue;
      }

      if (key === targetKey) {
        const valueToken: Token = { value, column: token.column + separator + 1 };
        const parsed = this.parseQube(valueToken, line, SpecifierPosition.PARAMETER);
        if (parsed.ok) {
          target = parsed.value;
        } else {
          diagnostics.push(...parsed.diagnostics);
        }
        continue;
      }

      params.push({ key, value });
    }

    if (diagnostics.length > 0) {
      return { ok: false, diagnostics };
    }
    return { ok: true, value: { target, params } };
  }

  /**
   * Read a qube specifier token without position checks
   */
  private readQube(token: Token, line: number): FieldResult<QubeSpecifier> {
    const value = token.value;

    switch (value) {
      case '@adminvm':
        return { ok: true, value: { kind: QubeSpecifierKind.ADMIN_VM } };
      case '@anyvm':
        return { ok: true, value: { kind: QubeSpecifierKind.ANY_VM } };
      case '@default':
        return { ok: true, value: { kind: QubeSpecifierKind.DEFAULT } };
      case '@dispvm':
        return { ok: true, value: { kind: QubeSpecifierKind.DISPVM } };
    }

    if (value.startsWith('@dispvm:@tag:')) {
      const tag = value.substring('@dispvm:@tag:'.length);
      if (!TAG_NAME.test(tag)) {
        return this.invalidSpecifier(token, line, 'tag');
      }
      return { ok: true, value: { kind: QubeSpecifierKind.DISPVM_BY_TAG, tag } };
    }

    if (value.startsWith('@dispvm:')) {
      const name = value.substring('@dispvm:'.length);
      if (!QUBE_NAME.test(name)) {
        return this.invalidSpecifier(token, line, 'template name');
      }
      return { ok: true, value: { kind: QubeSpecifierKind.DISPVM_NAMED, name } };
    }

    if (value.startsWith('@tag:')) {
      const tag = value.substring('@tag:'.length);
      if (!TAG_NAME.test(tag)) {
        return this.invalidSpecifier(token, line, 'tag');
      }
      return { ok: true, value: { kind: QubeSpecifierKind.TAG, tag } };
    }

    if (value.startsWith('@type:')) {
      const typeName = value.substring('@type:'.length);
      if (!TYPE_NAME.test(typeName)) {
        return this.invalidSpecifier(token, line, 'type');
      }
      return { ok: true, value: { kind: QubeSpecifierKind.TYPE, typeName } };
    }

    if (value.startsWith('@')) {
      return this.fail(createDiagnostic(
        'UnknownQubeKeyword',
        line,
        spanOf(token),
        `Unknown keyword "${value}"`
      ));
    }

    if (!QUBE_NAME.test(value)) {
      return this.fail(createDiagnostic(
        'InvalidQubeName',
        line,
        spanOf(token),
        value === ''
          ? 'Missing qube name'
          : `Invalid qube name "${value}": only letters, digits and "-" are allowed`
      ));
    }

    return { ok: true, value: { kind: QubeSpecifierKind.LITERAL, name: value } };
  }

  private invalidSpecifier(token: Token, line: number, what: string): FieldResult<QubeSpecifier> {
    return this.fail(createDiagnostic(
      'InvalidQubeSpecifier',
      line,
      spanOf(token),
      `Invalid ${what} in "${token.value}"`
    ));
  }

  private fail<T>(diagnostic: Diagnostic): FieldResult<T> {
    return { ok: false, diagnostics: [diagnostic] };
  }
}
