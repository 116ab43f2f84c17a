/**
 * Rule Matcher - Decides whether a single rule applies to a request
 */

import {
  ArgumentKind,
  ArgumentSpecifier,
  EvaluationRequest,
  QubeInfo,
  QubeSpecifier,
  QubeSpecifierKind,
  RequestDestination,
  Rule,
  ServiceSpecifier
} from './types';

/** Name under which the admin qube is known */
export const ADMIN_VM_NAME = 'dom0';
export const ADMIN_VM_TYPE = 'AdminVM';

export class RuleMatcher {
  matches(rule: Rule, request: EvaluationRequest): boolean {
    return this.matchService(rule.service, request.service) &&
      this.matchArgument(rule.argument, request.argument) &&
      this.matchSource(rule.source, request.source) &&
      this.matchDestination(rule.destination, request.destination);
  }

  matchService(spec: ServiceSpecifier, service: string): boolean {
    return spec.kind === 'wildcard' || spec.name === service;
  }

  matchArgument(spec: ArgumentSpecifier, argument: string): boolean {
    switch (spec.kind) {
      case ArgumentKind.ANY:
        return true;
      case ArgumentKind.EMPTY:
        return argument === '';
      case ArgumentKind.SPECIFIC:
        return argument === spec.text;
      default: {
        const unreachable: never = spec;
        throw new Error(`Unhandled argument specifier: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  /**
   * Source qubes are always concrete
   */
  matchSource(spec: QubeSpecifier, qube: QubeInfo): boolean {
    return this.matchQube(spec, qube);
  }

  matchDestination(spec: QubeSpecifier, destination: RequestDestination): boolean {
    switch (destination.kind) {
      case 'default':
        return spec.kind === QubeSpecifierKind.DEFAULT;

      case 'dispvm':
        switch (spec.kind) {
          case QubeSpecifierKind.ANY_VM:
            return true;
          case QubeSpecifierKind.DISPVM:
            return destination.template === undefined;
          case QubeSpecifierKind.DISPVM_NAMED:
            return destination.template?.name === spec.name;
          case QubeSpecifierKind.DISPVM_BY_TAG:
            return destination.template !== undefined && this.hasTag(destination.template, spec.tag);
          default:
            return false;
        }

      case 'qube':
        return this.matchQube(spec, destination.qube);

      default: {
        const unreachable: never = destination;
        throw new Error(`Unhandled destination: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  /**
   * Match a specifier against a concrete, named qube
   */
  private matchQube(spec: QubeSpecifier, qube: QubeInfo): boolean {
    switch (spec.kind) {
      case QubeSpecifierKind.LITERAL:
        return qube.name === spec.name;
      case QubeSpecifierKind.ADMIN_VM:
        return qube.name === ADMIN_VM_NAME || qube.type === ADMIN_VM_TYPE;
      case QubeSpecifierKind.ANY_VM:
        return true;
      case QubeSpecifierKind.TAG:
        return this.hasTag(qube, spec.tag);
      case QubeSpecifierKind.TYPE:
        return qube.type === spec.typeName;
      case QubeSpecifierKind.DEFAULT:
      case QubeSpecifierKind.DISPVM:
      case QubeSpecifierKind.DISPVM_NAMED:
      case QubeSpecifierKind.DISPVM_BY_TAG:
        // only match "no destination" and new-disposable requests
        return false;
      default: {
        const unreachable: never = spec;
        throw new Error(`Unhandled qube specifier: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private hasTag(qube: QubeInfo, tag: string): boolean {
    return qube.tags?.includes(tag) ?? false;
  }
}
