/**
 * Commands
 * ========
 *
 * A `CommandHandle` is what a view binds a button to: `execute`, `canExecute`
 * and a `CanExecuteChanged` notification. A `CommandDescriptor` declares the
 * command once per class and hands out one handle per owner.
 *
 * `CanExecuteChanged` is never raised automatically. The view model calls
 * `raiseCanExecuteChanged()` whenever a condition its predicate reads changes.
 */

import { NamedMember } from './observable'

export type CanExecuteChangedHandler<TParam> = (sender: CommandHandle<TParam>) => void

export class CommandHandle<TParam = void> {
  private readonly canExecuteChangedHandlers: CanExecuteChangedHandler<TParam>[] = []

  constructor(
    private readonly handler: (param: TParam) => void,
    private readonly predicate?: (param: TParam | undefined) => boolean
  ) {}

  execute(param: TParam): void {
    this.handler(param)
  }

  /** The predicate's answer, or true when the command has none. */
  canExecute(param?: TParam): boolean {
    return this.predicate ? this.predicate(param) : true
  }

  addCanExecuteChanged(handler: CanExecuteChangedHandler<TParam>): void {
    this.canExecuteChangedHandlers.push(handler)
  }

  /** Removes the first registration of `handler`. */
  removeCanExecuteChanged(handler: CanExecuteChangedHandler<TParam>): boolean {
    const index = this.canExecuteChangedHandlers.indexOf(handler)
    if (index === -1) return false
    this.canExecuteChangedHandlers.splice(index, 1)
    return true
  }

  onCanExecuteChanged(handler: CanExecuteChangedHandler<TParam>): () => void {
    this.addCanExecuteChanged(handler)
    return () => {
      this.removeCanExecuteChanged(handler)
    }
  }

  raiseCanExecuteChanged(): void {
    for (const handler of [...this.canExecuteChangedHandlers]) {
      handler(this)
    }
  }
}

/**
 * Declares a command for every instance of a class.
 *
 * @example
 * ```ts
 * const save = command<EditorViewModel, string>((vm, draft) => vm.save(draft))
 *   .canExecute(vm => vm.isDirty)
 *
 * save.get(editor) === save.get(editor) // true
 * ```
 */
export class CommandDescriptor<TOwner extends object, TParam = void> extends NamedMember {
  private readonly handles = new WeakMap<TOwner, CommandHandle<TParam>>()
  private predicate: ((owner: TOwner, param: TParam | undefined) => boolean) | undefined

  constructor(
    private readonly handler: (owner: TOwner, param: TParam) => void,
    canExecute?: (owner: TOwner, param: TParam | undefined) => boolean,
    name?: string
  ) {
    super(name)
    this.predicate = canExecute
  }

  /**
   * Sets the predicate deciding whether the command can run. Only handles
   * created afterwards use it.
   */
  canExecute(predicate: (owner: TOwner, param: TParam | undefined) => boolean): this {
    this.predicate = predicate
    return this
  }

  /**
   * The owner's handle, created on first access and reused after.
   */
  get(owner: TOwner): CommandHandle<TParam> {
    const existing = this.handles.get(owner)
    if (existing) return existing

    const predicate = this.predicate
    const handle = new CommandHandle<TParam>(
      param => this.handler(owner, param),
      predicate ? param => predicate(owner, param) : undefined
    )
    this.handles.set(owner, handle)
    return handle
  }
}

export function command<TOwner extends object, TParam = void>(
  handler: (owner: TOwner, param: TParam) => void
): CommandDescriptor<TOwner, TParam> {
  return new CommandDescriptor(handler)
}
