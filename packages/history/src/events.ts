import { EventEmitter } from 'events';

/**
 * EventEmitter restricted to the payloads declared in `M`.
 */
export class TypedEmitter<M extends object> {
  private emitter = new EventEmitter();

  emit<K extends keyof M & string>(event: K, payload: M[K]): void {
    this.emitter.emit(event, payload);
  }

  /** Returns a function that removes the listener. */
  on<K extends keyof M & string>(event: K, listener: (payload: M[K]) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
