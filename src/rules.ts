import {
  valid as validSemver,
  gt as semverGt,
  lt as semverLt,
  gte as semverGte,
  lte as semverLte,
} from 'semver';

import { AttributeValue, Attributes } from './types';

export enum OperatorType {
  MATCHES = 'MATCHES',
  NOT_MATCHES = 'NOT_MATCHES',
  GTE = 'GTE',
  GT = 'GT',
  LTE = 'LTE',
  LT = 'LT',
  ONE_OF = 'ONE_OF',
  NOT_ONE_OF = 'NOT_ONE_OF',
  IS_NULL = 'IS_NULL',
}

enum OperatorValueType {
  PLAIN_STRING = 'PLAIN_STRING',
  STRING_ARRAY = 'STRING_ARRAY',
  SEM_VER = 'SEM_VER',
  NUMERIC = 'NUMERIC',
}

type NumericOperator = OperatorType.GTE | OperatorType.GT | OperatorType.LTE | OperatorType.LT;

type MatchesCondition = {
  operator: OperatorType.MATCHES | OperatorType.NOT_MATCHES;
  attribute: string;
  value: string;
};

type OneOfCondition = {
  operator: OperatorType.ONE_OF | OperatorType.NOT_ONE_OF;
  attribute: string;
  value: string[];
};

type NumericCondition = {
  operator: NumericOperator;
  attribute: string;
  // a number, or a semantic version such as "1.2.0"
  value: number | string;
};

type NullCondition = {
  operator: OperatorType.IS_NULL;
  attribute: string;
  value: boolean;
};

export type Condition = MatchesCondition | OneOfCondition | NumericCondition | NullCondition;

/** A rule holds when all of its conditions hold. */
export interface Rule {
  conditions: Condition[];
}

export function matchesRule(rule: Rule, subjectAttributes: Attributes): boolean {
  return rule.conditions.every((condition) => evaluateCondition(subjectAttributes, condition));
}

/** Every rule must hold; an empty list holds. */
export function matchesAllRules(rules: Rule[], subjectAttributes: Attributes): boolean {
  return rules.every((rule) => matchesRule(rule, subjectAttributes));
}

function evaluateCondition(subjectAttributes: Attributes, condition: Condition): boolean {
  const value: AttributeValue | undefined = subjectAttributes[condition.attribute];

  if (condition.operator === OperatorType.IS_NULL) {
    if (condition.value) {
      return value === null || value === undefined;
    }
    return value !== null && value !== undefined;
  }

  if (value == null) {
    return false;
  }

  switch (condition.operator) {
    case OperatorType.GTE:
      return compare(value, condition.value, semverGte, (a, b) => a >= b);
    case OperatorType.GT:
      return compare(value, condition.value, semverGt, (a, b) => a > b);
    case OperatorType.LTE:
      return compare(value, condition.value, semverLte, (a, b) => a <= b);
    case OperatorType.LT:
      return compare(value, condition.value, semverLt, (a, b) => a < b);
    case OperatorType.MATCHES:
      return new RegExp(condition.value).test(String(value));
    case OperatorType.NOT_MATCHES:
      return !new RegExp(condition.value).test(String(value));
    case OperatorType.ONE_OF:
      return isOneOf(String(value).toLowerCase(), condition.value);
    case OperatorType.NOT_ONE_OF:
      return !isOneOf(String(value).toLowerCase(), condition.value);
  }
}

function isOneOf(attributeValue: string, conditionValues: string[]): boolean {
  return conditionValues.some((value) => value.toLowerCase() === attributeValue);
}

function compare(
  attributeValue: string | number | boolean,
  conditionValue: number | string,
  semverCompareFn: (a: string, b: string) => boolean,
  numericCompareFn: (a: number, b: number) => boolean,
): boolean {
  if (conditionValueType(conditionValue) === OperatorValueType.SEM_VER) {
    const attribute = String(attributeValue);
    return (
      !!validSemver(attribute) &&
      !!validSemver(String(conditionValue)) &&
      semverCompareFn(attribute, String(conditionValue))
    );
  }
  const a = Number(attributeValue);
  const b = Number(conditionValue);
  return !isNaN(a) && !isNaN(b) && numericCompareFn(a, b);
}

function conditionValueType(value: number | string | string[]): OperatorValueType {
  if (typeof value === 'number') {
    return OperatorValueType.NUMERIC;
  }

  if (Array.isArray(value)) {
    return OperatorValueType.STRING_ARRAY;
  }

  if (validSemver(value)) {
    return OperatorValueType.SEM_VER;
  }

  if (!isNaN(Number(value))) {
    return OperatorValueType.NUMERIC;
  }

  return OperatorValueType.PLAIN_STRING;
}
