import { MAX_PERCENTAGE, MIN_PERCENTAGE } from './constants';
import { ConfigurationError } from './errors';

export function validateNotBlank(value: string | undefined | null, errorMessage: string) {
  const isBlank = value == null || value.trim() === '';
  if (isBlank) {
    throw new Error(errorMessage);
  }
}

export function isValidPercentage(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_PERCENTAGE && value <= MAX_PERCENTAGE;
}

export function validatePercentage(percentage: number) {
  if (!isValidPercentage(percentage)) {
    throw new ConfigurationError(
      `Invalid rollout percentage ${percentage}: must be an integer between ${MIN_PERCENTAGE} and ${MAX_PERCENTAGE}`,
    );
  }
}
