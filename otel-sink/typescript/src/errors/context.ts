/**
 * Missing-context errors.
 *
 * The host invoked a hook out of lifecycle order, so the identity needed to
 * build labels is not there. Not recoverable inside the sink.
 */

import { OtelSinkError } from './base.js';

export class MissingContextError extends OtelSinkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      category: 'context',
      message,
      details,
    });
    this.name = 'MissingContextError';
  }

  static nodeInfo(): MissingContextError {
    return new MissingContextError('NodeInfo is not available in the current context.', {
      missing: 'nodeInfo',
    });
  }

  static testInfo(): MissingContextError {
    return new MissingContextError('TestInfo is not available in the current context.', {
      missing: 'testInfo',
    });
  }

  static notInitialized(hook: string): MissingContextError {
    return new MissingContextError(`Sink must be initialized before ${hook}`, {
      missing: 'init',
      hook,
    });
  }
}
