/**
 * Error classes for live hubs
 *
 * Usage:
 * ```typescript
 * throw new ProducerContractViolationError('ticks', 'push after complete()');
 * ```
 */

/**
 * Base error class for all hub errors
 */
export class LiveHubError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LiveHubError';
  }
}

/**
 * Thrown to the producer when it breaks the inlet contract: pushing after the hub
 * ended, claiming the inlet twice, or completing twice
 */
export class ProducerContractViolationError extends LiveHubError {
  public readonly hubName: string;

  constructor(hubName: string, violation: string, options?: ErrorOptions) {
    super(`Hub "${hubName}": ${violation}`, options);
    this.name = 'ProducerContractViolationError';
    this.hubName = hubName;
  }
}

/**
 * A subscription's buffer was full under the `fail-fast` policy
 */
export class SubscriberOverflowError extends LiveHubError {
  public readonly subscriptionId: string;
  public readonly capacity: number;

  constructor(subscriptionId: string, capacity: number) {
    super(`Subscription ${subscriptionId} exceeded its buffer capacity of ${capacity}`);
    this.name = 'SubscriberOverflowError';
    this.subscriptionId = subscriptionId;
    this.capacity = capacity;
  }
}

/**
 * Terminal failure delivered to every subscription of a hub
 */
export class HubFailedError extends LiveHubError {
  public readonly hubName: string;

  constructor(hubName: string, cause: unknown) {
    super(`Hub "${hubName}" failed: ${getErrorMessage(cause)}`, { cause });
    this.name = 'HubFailedError';
    this.hubName = hubName;
  }
}

/**
 * Delivering to one target threw; that target alone is detached with this error
 */
export class DeliveryFailedError extends LiveHubError {
  public readonly targetId: string;

  constructor(targetId: string, cause: unknown) {
    super(`Delivery to ${targetId} failed: ${getErrorMessage(cause)}`, { cause });
    this.name = 'DeliveryFailedError';
    this.targetId = targetId;
  }
}

/**
 * An environment variable held a value the hub cannot use
 */
export class LiveHubConfigError extends LiveHubError {
  public readonly variable: string;

  constructor(variable: string, message: string) {
    super(`Invalid ${variable}: ${message}`);
    this.name = 'LiveHubConfigError';
    this.variable = variable;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
