/**
 * mvvm-relay: MVVM Binding and Messaging
 * ======================================
 *
 * Building blocks for view models bound to a UI layer:
 *
 * - Change-notification properties and accessors
 * - A weak-reference-aware message bus drained on a periodic tick
 * - Commands with an enable/disable contract
 * - Observable lists
 * - lit-html views bound to view models
 *
 * @license MIT
 */

// =============================================================================
// MESSAGING
// =============================================================================

export { WeakHandle, type Handler, type AnyHandler, type Lifetime } from './weak-handle'
export {
  MessageBus,
  DEFAULT_TICK_INTERVAL,
  intervalScheduler,
  manualScheduler,
  type Scheduler,
  type ManualScheduler,
  type MessageBusOptions
} from './message-bus'
export { Topic } from './topic'
export {
  createMessageBusWithContext,
  useMessageBus,
  tryUseMessageBus,
  releaseMessageBus,
  useViewModel
} from './ergonomic'

// =============================================================================
// BINDING
// =============================================================================

export {
  ObservableValue,
  NotifiableProperty,
  NotifiableAccessor,
  NamedMember,
  defaultEquals,
  shallowEqual,
  type Equality,
  type ChangeListener,
  type PropertyChangeSource,
  type ObservableValueOptions,
  type NotifiablePropertyOptions,
  type NotifiableAccessorOptions
} from './observable'
export {
  ObservableList,
  type CollectionChangeAction,
  type CollectionChangedEvent,
  type CollectionChangedListener
} from './observable-list'
export {
  BindableObject,
  defineBindable,
  bindableMembers,
  type BindableMember,
  type PropertyChangedEventArgs,
  type PropertyChangedHandler
} from './bindable'
export { CommandHandle, CommandDescriptor, command, type CanExecuteChangedHandler } from './command'

// =============================================================================
// VIEWS
// =============================================================================

export {
  createView,
  type TemplateFunction,
  type ViewContext,
  type View,
  type CommandBinding,
  type PropertyBinding
} from './lit'

// =============================================================================
// ERRORS AND LOGGING
// =============================================================================

export { MvvmError, TargetUnavailableError, isTargetUnavailable } from './errors'
export { createLogger, enableDevMode, isDevMode, type Logger } from './logger'

// =============================================================================
// CALCULATOR
// =============================================================================

export * from './calculator'
