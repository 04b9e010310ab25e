/*
 * Terminal key decoder built on robot3.
 *
 * Plain bytes decode on their own. Arrow keys arrive as ESC [ A..D, and the
 * bytes of one sequence may show up in separate reads, so the decoder
 * remembers how far into a sequence it is:
 *
 * idle → escape (ESC) → csi ("[") → idle (final byte)
 *
 * A TIMEOUT while inside a sequence, or an unexpected byte after ESC, abandons
 * the sequence and yields an Unknown key.
 */

import {
  action,
  createMachine,
  guard,
  interpret,
  reduce,
  state,
  transition,
} from "robot3";

import {
  BRACKET_BYTE,
  ESCAPE_BYTE,
  type ParsedKey,
  arrowToInput,
  parseRegularKey,
} from "../key-mapping";

import type {
  Machine,
  MachineState,
  MachineStates,
  Service,
  Transition,
} from "robot3";

export type KeyDecoderState = "idle" | "escape" | "csi";

// Bytes of the escape sequence read so far; empty while idle
export type KeyDecoderContext = {
  sequence: ReadonlyArray<number>;
};

export type KeyDecoderEvent =
  | { type: "BYTE"; byte: number }
  | { type: "TIMEOUT" };

const isEscape = (_ctx: KeyDecoderContext, event: KeyDecoderEvent): boolean =>
  event.type === "BYTE" && event.byte === ESCAPE_BYTE;

const isBracket = (_ctx: KeyDecoderContext, event: KeyDecoderEvent): boolean =>
  event.type === "BYTE" && event.byte === BRACKET_BYTE;

const appendByte = (
  ctx: KeyDecoderContext,
  event: KeyDecoderEvent,
): KeyDecoderContext =>
  event.type === "BYTE" ? { sequence: [...ctx.sequence, event.byte] } : ctx;

const clearSequence = (): KeyDecoderContext => ({ sequence: [] });

const createActions = (emit: (key: ParsedKey) => void) => ({
  emitArrow: (ctx: KeyDecoderContext, event: KeyDecoderEvent): void => {
    if (event.type !== "BYTE") return;
    const input = arrowToInput(event.byte);
    emit(
      input === null
        ? { bytes: [...ctx.sequence, event.byte], kind: "Unknown" }
        : { input, kind: "Input" },
    );
  },
  emitRegular: (_ctx: KeyDecoderContext, event: KeyDecoderEvent): void => {
    if (event.type === "BYTE") emit(parseRegularKey(event.byte));
  },
  emitUnknown: (ctx: KeyDecoderContext, event: KeyDecoderEvent): void => {
    const bytes =
      event.type === "BYTE" ? [...ctx.sequence, event.byte] : ctx.sequence;
    emit({ bytes, kind: "Unknown" });
  },
});

type KeyDecoderActions = ReturnType<typeof createActions>;
type KeyDecoderEventType = KeyDecoderEvent["type"];

const createIdleState = (
  actions: KeyDecoderActions,
): MachineState<KeyDecoderEventType> =>
  state(
    transition("BYTE", "escape", guard(isEscape), reduce(appendByte)),
    transition("BYTE", "idle", action(actions.emitRegular)),
  );

const createEscapeState = (
  actions: KeyDecoderActions,
): MachineState<KeyDecoderEventType> =>
  state<Transition<KeyDecoderEventType>>(
    transition("BYTE", "csi", guard(isBracket), reduce(appendByte)),
    transition(
      "BYTE",
      "idle",
      action(actions.emitUnknown),
      reduce(clearSequence),
    ),
    transition(
      "TIMEOUT",
      "idle",
      action(actions.emitUnknown),
      reduce(clearSequence),
    ),
  );

const createCsiState = (
  actions: KeyDecoderActions,
): MachineState<KeyDecoderEventType> =>
  state<Transition<KeyDecoderEventType>>(
    transition("BYTE", "idle", action(actions.emitArrow), reduce(clearSequence)),
    transition(
      "TIMEOUT",
      "idle",
      action(actions.emitUnknown),
      reduce(clearSequence),
    ),
  );

type KeyDecoderStatesObject = Record<
  KeyDecoderState,
  MachineState<KeyDecoderEventType>
>;
export type KeyDecoderMachine = Machine<
  KeyDecoderStatesObject,
  KeyDecoderContext,
  KeyDecoderState,
  KeyDecoderEventType
>;

export const createKeyDecoderMachine = (
  emit: (key: ParsedKey) => void,
): KeyDecoderMachine => {
  const actions = createActions(emit);

  const states = {
    csi: createCsiState(actions),
    escape: createEscapeState(actions),
    idle: createIdleState(actions),
  } as const;

  // robot3 widens the event type to string; cast back at the module boundary
  return createMachine(
    "idle" as const,
    states as unknown as MachineStates<
      KeyDecoderStatesObject,
      KeyDecoderEventType
    >,
    (): KeyDecoderContext => ({ sequence: [] }),
  ) as unknown as KeyDecoderMachine;
};

type KeyDecoderService = Service<KeyDecoderMachine>;

/**
 * Thin wrapper around the robot3 service: feeds events in and hands back the
 * keys decoded by each one.
 */
export class KeyDecoder {
  private readonly service: KeyDecoderService;
  private decoded: Array<ParsedKey> = [];
  private currentStateName: KeyDecoderState = "idle";

  constructor() {
    const machine = createKeyDecoderMachine((key) => {
      this.decoded.push(key);
    });
    this.service = interpret(machine, (service) => {
      this.currentStateName = service.machine.state.name;
    });
  }

  get state(): KeyDecoderState {
    return this.currentStateName;
  }

  // True while part of an escape sequence has been read
  get isInSequence(): boolean {
    return this.currentStateName !== "idle";
  }

  feed(byte: number): ReadonlyArray<ParsedKey> {
    return this.send({ byte, type: "BYTE" });
  }

  // The wait for the rest of a sequence ran out
  timeout(): ReadonlyArray<ParsedKey> {
    return this.send({ type: "TIMEOUT" });
  }

  private send(event: KeyDecoderEvent): ReadonlyArray<ParsedKey> {
    this.service.send(event);
    const keys = this.decoded;
    this.decoded = [];
    return keys;
  }
}
