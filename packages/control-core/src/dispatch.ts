import { InputActionMapper } from "./InputActionMapper";
import type { GestureEvent, InputAction, InputInjector, InputMapperConfig } from "./types";

export type DispatchError = { type: "injector-failed"; action: InputAction; error: unknown };

export type DispatcherOptions = {
  mapper?: InputActionMapper;
  mapperConfig?: InputMapperConfig;
  onError?: (err: DispatchError) => void;
};

export interface Dispatcher {
  /** Maps and forwards one tick of events; returns the actions the injector accepted. */
  dispatch(events: readonly GestureEvent[]): InputAction[];
  /** Lifts any held button through the injector. */
  release(): InputAction[];
  readonly mapper: InputActionMapper;
}

export function createDispatcher(injector: InputInjector, options: DispatcherOptions = {}): Dispatcher {
  const mapper = options.mapper ?? new InputActionMapper(options.mapperConfig);

  function perform(actions: InputAction[]): InputAction[] {
    const performed: InputAction[] = [];
    for (const action of actions) {
      try {
        injector.perform(action);
        performed.push(action);
      } catch (error) {
        handleError({ type: "injector-failed", action, error });
      }
    }
    return performed;
  }

  function handleError(err: DispatchError) {
    if (options.onError) {
      options.onError(err);
      return;
    }
    console.error(`input injector failed on ${err.action.kind}`, err.error);
  }

  return {
    mapper,
    dispatch(events) {
      return events.flatMap((event) => perform(mapper.handle(event)));
    },
    release() {
      return perform(mapper.release());
    },
  };
}
