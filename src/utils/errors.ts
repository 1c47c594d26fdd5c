/**
 * Central error classes and validation utilities for prefix-pairing
 * @module utils/errors
 */

/**
 * Base error class for all prefix-pairing errors
 */
export class PrefixPairingError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'PrefixPairingError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    Error.captureStackTrace?.(this, this.constructor)
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends PrefixPairingError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid parameter '${parameterName}': ${reason}`,
      'INVALID_PARAMETER',
      { parameterName, value, reason, ...context }
    )
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends PrefixPairingError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

/**
 * Error thrown when a CIDR string or block value cannot form an address block
 */
export class InvalidAddressBlockError extends PrefixPairingError {
  public readonly input: string
  public readonly reason: string

  constructor(input: string, reason: string) {
    super(
      `Invalid address block '${input}': ${reason}`,
      'INVALID_ADDRESS_BLOCK',
      { input, reason }
    )
    this.name = 'InvalidAddressBlockError'
    this.input = input
    this.reason = reason
  }
}

/**
 * Error thrown when two blocks of different address families are compared
 */
export class AddressFamilyMismatchError extends PrefixPairingError {
  constructor(left: string, right: string) {
    super(
      `Cannot compare ${left} with ${right}: address families differ`,
      'ADDRESS_FAMILY_MISMATCH',
      { left, right }
    )
    this.name = 'AddressFamilyMismatchError'
  }
}

/**
 * Error thrown when a requester id or block key occurs more than once in a run
 */
export class DuplicateEntityError extends PrefixPairingError {
  public readonly entity: 'requester' | 'block'
  public readonly key: string

  constructor(entity: 'requester' | 'block', key: string) {
    super(`Duplicate ${entity}: ${key}`, 'DUPLICATE_ENTITY', { entity, key })
    this.name = 'DuplicateEntityError'
    this.entity = entity
    this.key = key
  }
}

/**
 * Error thrown when a preference list does not rank exactly the opposite side
 */
export class IncompletePreferenceListError extends PrefixPairingError {
  public readonly owner: string

  constructor(owner: string, reason: string, context?: Record<string, unknown>) {
    super(
      `Preference list for '${owner}' is incomplete: ${reason}`,
      'INCOMPLETE_PREFERENCE_LIST',
      { owner, reason, ...context }
    )
    this.name = 'IncompletePreferenceListError'
    this.owner = owner
  }
}

/**
 * Error thrown when synthetic scenario generation cannot produce unique blocks
 */
export class ScenarioGenerationError extends PrefixPairingError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SCENARIO_GENERATION_FAILED', context)
    this.name = 'ScenarioGenerationError'
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a number is a positive integer (> 0)
 */
export function requirePositiveInteger(
  value: number,
  parameterName: string
): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be an integer'
    )
  }
  if (value <= 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be positive (> 0)'
    )
  }
  return value
}

/**
 * Validates that a number is a non-negative integer (>= 0)
 */
export function requireNonNegativeInteger(
  value: number,
  parameterName: string
): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be an integer'
    )
  }
  if (value < 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be non-negative (>= 0)'
    )
  }
  return value
}

/**
 * Validates that an array is non-empty
 */
export function requireNonEmptyArray<T>(
  value: readonly T[],
  parameterName: string
): readonly T[] {
  if (!Array.isArray(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be an array'
    )
  }
  if (value.length === 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must not be empty'
    )
  }
  return value
}

/**
 * Validates that a string is non-empty
 */
export function requireNonEmptyString(value: string, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a string'
    )
  }
  if (value.trim().length === 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must not be empty'
    )
  }
  return value
}

/**
 * Validates that a value is one of the allowed options, narrowing it to their type
 */
export function requireOneOf<T>(
  value: unknown,
  allowedValues: readonly T[],
  parameterName: string
): T {
  const match = allowedValues.find((allowed) => allowed === value)
  if (match === undefined) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be one of: ${allowedValues.join(', ')}`
    )
  }
  return match
}

/**
 * Check if an error is a prefix-pairing error
 */
export function isPrefixPairingError(error: unknown): error is PrefixPairingError {
  return error instanceof PrefixPairingError
}
