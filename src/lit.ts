/**
 * mvvm-relay Lit-HTML Integration Module
 * ======================================
 *
 * Binds view models to lit-html templates. A view renders its template with
 * the view model and a `ViewContext`, then re-renders whenever:
 *
 * - the view model raises `PropertyChanged`,
 * - a command used through `ctx.command` raises `CanExecuteChanged`,
 * - a list rendered through `ctx.list` changes.
 *
 * Listeners are attached lazily on first use and removed by `destroy()`.
 */

import { html, render, type TemplateResult } from 'lit-html'
import { repeat } from 'lit-html/directives/repeat.js'

import type { BindableObject } from './bindable'
import type { CommandHandle } from './command'
import { createLogger } from './logger'
import type { ObservableList } from './observable-list'

const log = createLogger('view')

// =============================================================================
// CORE VIEW TYPES
// =============================================================================

/**
 * Template function that receives the view model and returns a lit-html template
 */
export type TemplateFunction<TViewModel extends BindableObject> = (
  viewModel: TViewModel,
  context: ViewContext<TViewModel>
) => TemplateResult

export interface CommandBinding {
  readonly disabled: boolean
  readonly onClick: () => void
}

export interface PropertyBinding<TValue> {
  readonly value: TValue
  readonly onInput: (event: Event) => void
}

/**
 * View context passed to template functions
 */
export interface ViewContext<TViewModel extends BindableObject> {
  readonly viewModel: TViewModel

  /** Click handler and enabled state of `handle` for `param`. */
  command<TParam>(handle: CommandHandle<TParam>, param: TParam): CommandBinding

  /** Two-way binding of a text input to a view model property. */
  bind<K extends keyof TViewModel & string>(name: K): PropertyBinding<TViewModel[K]>

  /** Keyed rendering of an observable list. */
  list<TItem>(
    items: ObservableList<TItem>,
    key: (item: TItem, index: number) => unknown,
    template: (item: TItem, index: number) => TemplateResult
  ): unknown
}

/**
 * View instance with lifecycle management
 */
export interface View<TViewModel extends BindableObject> {
  readonly viewModel: TViewModel
  readonly container: HTMLElement
  readonly renderCount: number
  readonly destroyed: boolean
  render(): void
  destroy(): void
}

// =============================================================================
// REACTIVE VIEW BINDING
// =============================================================================

/**
 * Create a view that renders immediately and re-renders on every change of
 * its view model.
 */
export function createView<TViewModel extends BindableObject>(
  viewModel: TViewModel,
  container: HTMLElement,
  template: TemplateFunction<TViewModel>
): View<TViewModel> {
  let isDestroyed = false
  let renderCount = 0
  const cleanupCallbacks: Array<() => void> = []
  const trackedCommands = new Set<object>()
  const trackedLists = new Set<object>()

  const context: ViewContext<TViewModel> = {
    viewModel,

    command: <TParam>(handle: CommandHandle<TParam>, param: TParam): CommandBinding => {
      if (!trackedCommands.has(handle)) {
        trackedCommands.add(handle)
        cleanupCallbacks.push(handle.onCanExecuteChanged(() => renderView()))
      }
      return {
        disabled: !handle.canExecute(param),
        onClick: () => {
          if (handle.canExecute(param)) handle.execute(param)
        }
      }
    },

    bind: <K extends keyof TViewModel & string>(name: K): PropertyBinding<TViewModel[K]> => ({
      value: viewModel[name],
      onInput: (event: Event) => {
        const target = event.target
        if (target instanceof HTMLInputElement || target instanceof HTMLTextAreaElement) {
          Reflect.set(viewModel, name, target.value)
        }
      }
    }),

    list: <TItem>(
      items: ObservableList<TItem>,
      key: (item: TItem, index: number) => unknown,
      itemTemplate: (item: TItem, index: number) => TemplateResult
    ) => {
      if (!trackedLists.has(items)) {
        trackedLists.add(items)
        cleanupCallbacks.push(items.onCollectionChanged(() => renderView()))
      }
      return repeat(items.toArray(), key, itemTemplate)
    }
  }

  const renderView = () => {
    if (isDestroyed) return
    renderCount++

    try {
      render(template(viewModel, context), container)
    } catch (error) {
      log.error('Error rendering view:', error)
      render(html`<div class="render-error">Render Error: ${String(error)}</div>`, container)
    }
  }

  cleanupCallbacks.push(viewModel.onPropertyChanged(() => renderView()))

  const view: View<TViewModel> = {
    viewModel,
    container,

    get renderCount() {
      return renderCount
    },

    get destroyed() {
      return isDestroyed
    },

    render: renderView,

    destroy: () => {
      if (isDestroyed) return
      isDestroyed = true

      cleanupCallbacks.forEach(cleanup => cleanup())
      cleanupCallbacks.length = 0
      trackedCommands.clear()
      trackedLists.clear()

      render(html``, container)
    }
  }

  renderView()

  return view
}
