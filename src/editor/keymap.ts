import { isPrintable } from "./buffer.js";
import type { EditSession } from "./session.js";
import type { Direction } from "./state.js";

export type CommandId = "file.save" | "quit";

export type Binding = {
  key: string;
  label: string;
  title: string;
  commandId: CommandId;
};

// nano-style control bindings
export const bindings: Binding[] = [
  { key: "C-x", label: "^X", title: "Exit", commandId: "quit" },
  { key: "C-o", label: "^O", title: "Save", commandId: "file.save" },
];

export type KeyEvent =
  | { kind: "char"; ch: string }
  | { kind: "move"; direction: Direction }
  | { kind: "backspace" }
  | { kind: "enter" }
  | { kind: "command"; commandId: CommandId }
  | { kind: "unknown" };

/** The subset of a neo-blessed keypress descriptor that matters here. */
export type KeyInfo = {
  name?: string;
  full?: string;
  ctrl?: boolean;
  meta?: boolean;
};

export type KeyOutcome = "continue" | "exit";

const directions = new Map<string, Direction>([
  ["up", "up"],
  ["down", "down"],
  ["left", "left"],
  ["right", "right"],
]);

export function translateKey(
  ch: string | undefined,
  key: KeyInfo | undefined,
): KeyEvent {
  const name = key?.name ?? "";
  const full = key?.full ?? name;

  const binding = bindings.find((b) => b.key === full);
  if (binding) return { kind: "command", commandId: binding.commandId };

  const direction = directions.get(name);
  if (direction) return { kind: "move", direction };
  if (name === "backspace") return { kind: "backspace" };
  if (name === "enter") return { kind: "enter" };

  if (!key?.ctrl && !key?.meta && ch && isPrintable(ch))
    return { kind: "char", ch };
  return { kind: "unknown" };
}

export function handleKey(session: EditSession, ev: KeyEvent): KeyOutcome {
  const isQuit = ev.kind === "command" && ev.commandId === "quit";

  // A pending exit swallows exactly one key
  if (session.pendingExit) {
    if (isQuit) return "exit";
    session.cancelExit();
    return "continue";
  }

  switch (ev.kind) {
    case "command":
      if (ev.commandId === "quit")
        return session.requestExit() ? "exit" : "continue";
      session.save();
      break;
    case "move":
      session.move(ev.direction);
      break;
    case "backspace":
      session.backspace();
      break;
    case "enter":
      session.enter();
      break;
    case "char":
      session.insertPrintable(ev.ch);
      break;
    case "unknown":
      break;
  }
  return "continue";
}

export function describeBindings(): string {
  return bindings.map((b) => `${b.label} ${b.title}`).join("  ");
}
