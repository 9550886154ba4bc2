/**
 * mvvm-relay Context API (with unctx)
 * ===================================
 *
 * The message bus lives for the whole process. This module registers the bus
 * created at startup in a namespaced `unctx` context so setup code can reach it
 * without threading it through every call:
 *
 * 1. `createMessageBusWithContext` creates the bus and makes it the active
 *    context.
 * 2. `useMessageBus()` / `tryUseMessageBus()` return it from anywhere within
 *    synchronous setup code.
 *
 * View models still receive the bus through their constructor; these hooks are
 * for the composition root.
 *
 * --- ASYNC USAGE ---
 * As with all `unctx` implementations, the context is only available
 * synchronously. Cache the bus in a local variable before the first `await`.
 */

import { getContext } from 'unctx';
import { MessageBus, type MessageBusOptions } from './message-bus';
import type { BindableObject } from './bindable';

// --- UNCTX SETUP ---

/**
 * The namespaced context holding the process-wide bus.
 */
const busContext = getContext<MessageBus>('mvvm-relay-message-bus');

// --- CORE API ---

/**
 * Creates the process-wide message bus and sets it as the active context.
 * Replaces (and disposes) a previously registered bus, which keeps hot module
 * reloading in development working.
 */
export function createMessageBusWithContext(options?: MessageBusOptions): MessageBus {
  const previous = busContext.tryUse();
  const bus = new MessageBus(options);
  busContext.set(bus, true);
  previous?.dispose();
  return bus;
}

/**
 * Returns the active message bus. Throws when none was created.
 */
export function useMessageBus(): MessageBus {
  return busContext.use();
}

/**
 * Returns the active message bus, or `null` outside of a context.
 */
export function tryUseMessageBus(): MessageBus | null {
  return busContext.tryUse() ?? null;
}

/**
 * Disposes and unregisters the active bus.
 */
export function releaseMessageBus(): void {
  busContext.tryUse()?.dispose();
  busContext.unset();
}

/**
 * Constructs a view model with the active bus.
 *
 * @example
 * const calculator = useViewModel(CalculatorViewModel);
 */
export function useViewModel<TViewModel extends BindableObject>(
  ctor: new (messenger: MessageBus) => TViewModel
): TViewModel {
  return new ctor(useMessageBus());
}
