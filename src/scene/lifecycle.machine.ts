/*
 * Scene lifecycle state machine (robot3)
 *
 *   unattached --ATTACH--> inactive --ENTER--> active
 *        ^                  |   ^                |
 *        +------DETACH------+   +------EXIT------+
 *        ^                                       |
 *        +-----------------DETACH----------------+
 *
 * DETACH from "active" does not pass through EXIT: the controller never
 * calls exit() on removal. Events with no transition in the current state
 * are ignored by robot3.
 *
 * State builders return MachineState<SceneLifecycleEvent> so every
 * transition in a state is checked against the full event union.
 */
import { createMachine, interpret, state, transition } from "robot3";

import type {
  Machine,
  MachineState,
  MachineStates,
  Service,
  Transition,
} from "robot3";

export type SceneLifecycleState = "unattached" | "inactive" | "active";

export type SceneLifecycleEvent = "ATTACH" | "DETACH" | "ENTER" | "EXIT";

type SceneLifecycleContext = Record<string, never>;
type SceneLifecycleStates = Record<
  SceneLifecycleState,
  MachineState<SceneLifecycleEvent>
>;

export type SceneLifecycleMachine = Machine<
  SceneLifecycleStates,
  SceneLifecycleContext,
  SceneLifecycleState,
  SceneLifecycleEvent
>;

const createActiveState = (): MachineState<SceneLifecycleEvent> =>
  state<Transition<SceneLifecycleEvent>>(
    transition("EXIT", "inactive"),
    transition("DETACH", "unattached"),
  );

const createInactiveState = (): MachineState<SceneLifecycleEvent> =>
  state<Transition<SceneLifecycleEvent>>(
    transition("ENTER", "active"),
    transition("ATTACH", "inactive"),
    transition("DETACH", "unattached"),
  );

const createUnattachedState = (): MachineState<SceneLifecycleEvent> =>
  state<Transition<SceneLifecycleEvent>>(transition("ATTACH", "inactive"));

export const createSceneLifecycleMachine = (): SceneLifecycleMachine => {
  const states: SceneLifecycleStates = {
    active: createActiveState(),
    inactive: createInactiveState(),
    unattached: createUnattachedState(),
  };

  // robot3 widens the event type to string; restore the lifecycle unions.
  return createMachine(
    "unattached" as const,
    states as unknown as MachineStates<
      SceneLifecycleStates,
      SceneLifecycleEvent
    >,
    (): SceneLifecycleContext => ({}),
  ) as unknown as SceneLifecycleMachine;
};

/** Thin wrapper holding the interpreted machine for one scene. */
export class SceneLifecycle {
  private current: SceneLifecycleState = "unattached";
  private readonly service: Service<SceneLifecycleMachine>;

  constructor() {
    this.service = interpret(createSceneLifecycleMachine(), (service) => {
      this.current = service.machine.state.name;
    });
  }

  send(event: SceneLifecycleEvent): SceneLifecycleState {
    this.service.send(event);
    return this.current;
  }

  getState(): SceneLifecycleState {
    return this.current;
  }
}
