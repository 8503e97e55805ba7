#!/usr/bin/env node
import blessed from "neo-blessed";
import path from "node:path";

import { resolveConfig, USAGE, UsageError, type EditorConfig } from "./config.js";
import { EditSession } from "./editor/session.js";
import { handleKey, translateKey } from "./editor/keymap.js";
import { renderView } from "./editor/render.js";

function loadConfig(): EditorConfig {
  try {
    return resolveConfig(process.argv.slice(2), process.env);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    process.stderr.write(`linedit: ${err.message}\n${USAGE}\n`);
    process.exit(2);
  }
}

const config = loadConfig();
if (config.showHelp) {
  process.stdout.write(`${USAGE}\n\n^O save  ^X exit\n`);
  process.exit(0);
}

const screen = blessed.screen({
  smartCSR: true,
  title: config.filename ? path.basename(config.filename) : "linedit",
  fullUnicode: false,
});

const editorBox = blessed.box({
  top: 0,
  left: 0,
  width: "100%",
  height: `100%-${config.reservedRows}`,
  tags: false,
});
screen.append(editorBox);

const status = blessed.box({
  bottom: 2,
  left: 0,
  width: "100%",
  height: 1,
  tags: false,
  style: { inverse: true },
});
screen.append(status);

const message = blessed.box({
  bottom: 1,
  left: 0,
  width: "100%",
  height: 1,
  tags: false,
  style: { inverse: true },
});
screen.append(message);

const help = blessed.box({
  bottom: 0,
  left: 0,
  width: "100%",
  height: 1,
  tags: false,
});
screen.append(help);

function cells(value: number | string) {
  return typeof value === "number" ? value : Number.parseInt(value, 10) || 0;
}

function screenRows() {
  return cells(screen.height) - config.reservedRows;
}

function screenCols() {
  return cells(screen.width);
}

const session = new EditSession({
  screenRows: screenRows(),
  screenCols: screenCols(),
  defaultFilename: config.defaultFilename,
});

if (config.filename) session.open(path.resolve(config.filename));

function render() {
  const view = renderView(session);
  editorBox.setContent(view.lines.join("\n"));
  status.setContent(view.status);
  message.setContent(view.message);
  help.setContent(view.help);
  screen.render();

  screen.program.cup(view.cursor.y, view.cursor.x);
  screen.program.showCursor();
}

screen.on("keypress", (ch, key) => {
  const outcome = handleKey(session, translateKey(ch, key));
  if (outcome === "exit") {
    screen.destroy();
    process.exit(0);
  }
  render();
});

screen.on("resize", () => {
  session.resize(screenRows(), screenCols());
  render();
});

editorBox.focus();
render();
