import { ConfigurationError } from '../../errors/MatchDomainErrors';
import type {
  ResolvedRules,
  RuleDescriptor,
  RuleOption,
  RuleOverrides,
  RuleValue,
  RuleValueType,
} from '../../types/match';

/**
 * Clock rules accepted by every game kind. Kinds may narrow
 * `timeoutSeconds` through {@link withTimingRules}.
 */
export const TIMING_RULES: RuleDescriptor = {
  timeoutType: {
    type: 'string',
    allowedValues: ['none', 'per_turn', 'total_time'],
    default: 'none',
    description:
      "Clock mode: 'none', 'per_turn' (limit per turn) or 'total_time' (budget per participant)",
  },
  timeoutSeconds: {
    type: 'integer',
    default: 300,
    description: 'Clock length in seconds. Ignored when timeoutType is none',
  },
  timeoutAction: {
    type: 'string',
    allowedValues: ['end_game', 'skip_turn', 'eliminate_player'],
    default: 'end_game',
    description: 'What happens when a clock runs out',
  },
};

export function withTimingRules(
  rules: RuleDescriptor,
  timeoutSeconds: Partial<RuleOption> = {}
): RuleDescriptor {
  return {
    ...rules,
    ...TIMING_RULES,
    timeoutSeconds: { ...TIMING_RULES.timeoutSeconds, ...timeoutSeconds },
  };
}

function matchesType(type: RuleValueType, value: RuleValue): boolean {
  switch (type) {
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'string':
      return typeof value === 'string';
  }
}

/**
 * Validate user-supplied overrides against a descriptor and fill defaults.
 *
 * @throws ConfigurationError on an unknown key, a wrong type, a disallowed
 * value or a number outside `[min, max]`.
 */
export function validateRuleSet(descriptor: RuleDescriptor, overrides: RuleOverrides = {}): ResolvedRules {
  const resolved: ResolvedRules = {};
  for (const [key, option] of Object.entries(descriptor)) {
    resolved[key] = option.default;
  }

  for (const [key, value] of Object.entries(overrides)) {
    if (!Object.prototype.hasOwnProperty.call(descriptor, key)) {
      throw new ConfigurationError(`Unknown rule '${key}'`, {
        rule: key,
        supported: Object.keys(descriptor),
      });
    }
    if (value === null || value === undefined) {
      continue;
    }

    const option = descriptor[key];
    if (!matchesType(option.type, value)) {
      throw new ConfigurationError(`Rule '${key}' must be of type ${option.type}`, {
        rule: key,
        value,
      });
    }
    if (option.allowedValues && !option.allowedValues.includes(value)) {
      throw new ConfigurationError(
        `Rule '${key}' must be one of: ${option.allowedValues.join(', ')}`,
        { rule: key, value }
      );
    }
    if (typeof value === 'number') {
      if (option.min !== undefined && value < option.min) {
        throw new ConfigurationError(`Rule '${key}' must be at least ${option.min}`, {
          rule: key,
          value,
        });
      }
      if (option.max !== undefined && value > option.max) {
        throw new ConfigurationError(`Rule '${key}' must be at most ${option.max}`, {
          rule: key,
          value,
        });
      }
    }

    resolved[key] = value;
  }

  return resolved;
}
