/*
 * DAS (Delayed Auto Shift) state machine on robot3
 *
 * One horizontal direction is tracked at a time. The machine is fed
 * key edges and a clock tick per frame; it reports the horizontal moves
 * those events produce through the onOutput callback.
 *
 * ROBOT3 NOTES:
 * - Context is immutable; reducers return a new object
 * - action() runs in argument order after the reducers before it, so an
 *   action sees the context its transition just produced
 * - interpret(machine, onChange) runs the machine; service.send(event)
 *   drives it
 *
 * STATE FLOW:
 * idle → charging (KEY_DOWN, emits a tap)
 * charging → idle (KEY_UP of the held direction)
 * charging → repeating (TIMER_TICK once DAS has elapsed, emits the first repeats)
 * repeating → repeating (TIMER_TICK at ARR intervals, with catch-up)
 * repeating → idle (KEY_UP of the held direction)
 * any → charging (KEY_DOWN, the new direction replaces the old)
 *
 * With ARR at 0 every repeat becomes a slide to the wall, emitted on each
 * tick while repeating.
 */

import {
  createMachine,
  state,
  transition,
  guard,
  reduce,
  action,
  interpret,
} from "robot3";

import type {
  MachineState,
  MachineStates,
  Machine,
  Service,
  Transition,
} from "robot3";

export type DASState = "idle" | "charging" | "repeating";

export type Direction = -1 | 1;

export type DASContext = {
  direction: Direction | undefined;
  dasStartTime: number | undefined; // KEY_DOWN timestamp
  arrLastTime: number | undefined; // time of the latest repeat emitted
  dasMs: number;
  arrMs: number; // 0 means slide to the wall
  repeats: number; // repeats owed by the current tick
};

export type DASEvent =
  | { type: "KEY_DOWN"; direction: Direction; timestamp: number }
  | { type: "KEY_UP"; direction: Direction; timestamp: number }
  | { type: "TIMER_TICK"; timestamp: number }
  | { type: "UPDATE_CONFIG"; dasMs: number; arrMs: number };

/** What the machine asks the controller to do. */
export type DASOutput =
  | { type: "Tap"; direction: Direction; timestamp: number }
  | { type: "Charged"; direction: Direction; timestamp: number }
  | { type: "Repeat"; direction: Direction; count: number; timestamp: number }
  | { type: "Slide"; direction: Direction; timestamp: number };

/*
 * GUARDS
 */

const isKeyDown = (_ctx: DASContext, event: DASEvent): boolean =>
  event.type === "KEY_DOWN";

// Only releasing the held direction stops the machine
const isActiveKeyUp = (ctx: DASContext, event: DASEvent): boolean =>
  event.type === "KEY_UP" &&
  ctx.direction !== undefined &&
  event.direction === ctx.direction;

const isDASExpired = (ctx: DASContext, event: DASEvent): boolean => {
  if (event.type !== "TIMER_TICK") return false;
  if (ctx.dasStartTime === undefined) return false;
  return event.timestamp - ctx.dasStartTime >= ctx.dasMs;
};

const shouldEmitARR = (ctx: DASContext, event: DASEvent): boolean => {
  if (event.type !== "TIMER_TICK") return false;
  if (ctx.direction === undefined || ctx.arrLastTime === undefined) {
    return false;
  }
  if (ctx.arrMs === 0) return true;
  return event.timestamp >= ctx.arrLastTime + ctx.arrMs;
};

const isConfigUpdate = (_ctx: DASContext, event: DASEvent): boolean =>
  event.type === "UPDATE_CONFIG";

/*
 * REDUCERS
 */

export const updateContextKeyDown = (
  ctx: DASContext,
  event: DASEvent,
): DASContext => {
  if (event.type !== "KEY_DOWN") return ctx;
  return {
    ...ctx,
    arrLastTime: undefined,
    dasStartTime: event.timestamp,
    direction: event.direction,
    repeats: 0,
  };
};

export const updateContextKeyUp = (ctx: DASContext): DASContext => ({
  ...ctx,
  arrLastTime: undefined,
  dasStartTime: undefined,
  direction: undefined,
  repeats: 0,
});

// First repeat lands at dasStart + das; a late tick owes one more per ARR
export const updateContextHoldStart = (
  ctx: DASContext,
  event: DASEvent,
): DASContext => {
  if (event.type !== "TIMER_TICK" || ctx.dasStartTime === undefined) {
    return ctx;
  }
  if (ctx.arrMs === 0) {
    return { ...ctx, arrLastTime: event.timestamp, repeats: 1 };
  }
  const first = ctx.dasStartTime + ctx.dasMs;
  const repeats = 1 + Math.floor((event.timestamp - first) / ctx.arrMs);
  return {
    ...ctx,
    arrLastTime: first + (repeats - 1) * ctx.arrMs,
    repeats,
  };
};

export const updateContextARR = (
  ctx: DASContext,
  event: DASEvent,
): DASContext => {
  if (event.type !== "TIMER_TICK" || ctx.arrLastTime === undefined) {
    return ctx;
  }
  if (ctx.arrMs === 0) {
    return { ...ctx, arrLastTime: event.timestamp, repeats: 1 };
  }
  const repeats = Math.floor((event.timestamp - ctx.arrLastTime) / ctx.arrMs);
  return {
    ...ctx,
    arrLastTime: ctx.arrLastTime + repeats * ctx.arrMs,
    repeats,
  };
};

export const updateConfig = (ctx: DASContext, event: DASEvent): DASContext => {
  if (event.type !== "UPDATE_CONFIG") return ctx;
  return {
    ...ctx,
    arrMs: Math.max(0, event.arrMs),
    dasMs: Math.max(0, event.dasMs),
  };
};

/*
 * ACTIONS
 */

type OutputSink = (output: DASOutput) => void;

type DASActions = {
  emitTap: (ctx: DASContext, event: DASEvent) => void;
  emitCharged: (ctx: DASContext, event: DASEvent) => void;
  emitRepeat: (ctx: DASContext, event: DASEvent) => void;
};

const createDASActions = (onOutput?: OutputSink): DASActions => ({
  emitCharged: (ctx, event): void => {
    if (ctx.direction === undefined || !onOutput) return;
    if (event.type !== "TIMER_TICK") return;
    onOutput({
      direction: ctx.direction,
      timestamp: event.timestamp,
      type: "Charged",
    });
  },
  emitRepeat: (ctx, event): void => {
    if (ctx.direction === undefined || !onOutput) return;
    if (event.type !== "TIMER_TICK" || ctx.repeats <= 0) return;
    if (ctx.arrMs === 0) {
      onOutput({
        direction: ctx.direction,
        timestamp: event.timestamp,
        type: "Slide",
      });
      return;
    }
    onOutput({
      count: ctx.repeats,
      direction: ctx.direction,
      timestamp: event.timestamp,
      type: "Repeat",
    });
  },
  emitTap: (_ctx, event): void => {
    if (event.type !== "KEY_DOWN" || !onOutput) return;
    onOutput({
      direction: event.direction,
      timestamp: event.timestamp,
      type: "Tap",
    });
  },
});

/*
 * STATES
 */

const createIdleState = (actions: DASActions): MachineState<DASEventType> =>
  state<Transition<DASEventType>>(
    transition(
      "KEY_DOWN",
      "charging",
      guard(isKeyDown),
      reduce(updateContextKeyDown),
      action(actions.emitTap),
    ),
    transition(
      "UPDATE_CONFIG",
      "idle",
      guard(isConfigUpdate),
      reduce(updateConfig),
    ),
  );

const createChargingState = (
  actions: DASActions,
): MachineState<DASEventType> =>
  state<Transition<DASEventType>>(
    transition(
      "KEY_UP",
      "idle",
      guard(isActiveKeyUp),
      reduce(updateContextKeyUp),
    ),
    transition(
      "TIMER_TICK",
      "repeating",
      guard(isDASExpired),
      reduce(updateContextHoldStart),
      action(actions.emitCharged),
      action(actions.emitRepeat),
    ),
    transition(
      "KEY_DOWN",
      "charging",
      guard(isKeyDown),
      reduce(updateContextKeyDown),
      action(actions.emitTap),
    ),
    transition(
      "UPDATE_CONFIG",
      "charging",
      guard(isConfigUpdate),
      reduce(updateConfig),
    ),
  );

const createRepeatingState = (
  actions: DASActions,
): MachineState<DASEventType> =>
  state<Transition<DASEventType>>(
    transition(
      "KEY_UP",
      "idle",
      guard(isActiveKeyUp),
      reduce(updateContextKeyUp),
    ),
    transition(
      "TIMER_TICK",
      "repeating",
      guard(shouldEmitARR),
      reduce(updateContextARR),
      action(actions.emitRepeat),
    ),
    transition(
      "KEY_DOWN",
      "charging",
      guard(isKeyDown),
      reduce(updateContextKeyDown),
      action(actions.emitTap),
    ),
    transition(
      "UPDATE_CONFIG",
      "repeating",
      guard(isConfigUpdate),
      reduce(updateConfig),
    ),
  );

/*
 * MACHINE
 */

type DASEventType = DASEvent["type"];
type DASStatesObject = Record<DASState, MachineState<DASEventType>>;
export type DASMachine = Machine<
  DASStatesObject,
  DASContext,
  DASState,
  DASEventType
>;

export const createDASMachine = (
  initialContext: DASContext,
  onOutput?: OutputSink,
): DASMachine => {
  const actions = createDASActions(onOutput);

  const states = {
    charging: createChargingState(actions),
    idle: createIdleState(actions),
    repeating: createRepeatingState(actions),
  } as const;

  // robot3 widens the event type to string; cast back at the module edge
  return createMachine(
    "idle" as const,
    states as unknown as MachineStates<DASStatesObject, DASEventType>,
    (): DASContext => initialContext,
  ) as unknown as DASMachine;
};

export const createDefaultDASContext = (
  dasMs = 170,
  arrMs = 30,
): DASContext => ({
  arrLastTime: undefined,
  arrMs: Math.max(0, arrMs),
  dasMs: Math.max(0, dasMs),
  dasStartTime: undefined,
  direction: undefined,
  repeats: 0,
});

type DASService = Service<DASMachine>;

/**
 * Thin wrapper around the robot3 service. Collects the outputs of each
 * send and keeps a typed copy of the current state name.
 */
export class DASMachineService {
  private service: DASService;
  private outputQueue: Array<DASOutput> = [];
  private currentStateName: DASState = "idle";

  constructor(initialContext?: DASContext) {
    this.service = this.start(initialContext ?? createDefaultDASContext());
  }

  send(event: DASEvent): Array<DASOutput> {
    this.service.send(event);
    const outputs = [...this.outputQueue];
    this.outputQueue = [];
    return outputs;
  }

  getState(): { state: DASState; context: DASContext } {
    return {
      context: { ...this.service.context },
      state: this.currentStateName,
    };
  }

  updateConfig(dasMs: number, arrMs: number): Array<DASOutput> {
    return this.send({ arrMs, dasMs, type: "UPDATE_CONFIG" });
  }

  /** Back to idle, keeping the timing settings. */
  reset(): void {
    const { arrMs, dasMs } = this.service.context;
    this.outputQueue = [];
    this.service = this.start(createDefaultDASContext(dasMs, arrMs));
  }

  private start(context: DASContext): DASService {
    this.currentStateName = "idle";
    const machine = createDASMachine(context, (output) => {
      this.outputQueue.push(output);
    });
    return interpret(machine, (service) => {
      this.currentStateName = service.machine.state.name;
    });
  }
}
