import readline, { type Key } from "node:readline";
import { setSilent } from "../util/logger.js";
import type { App } from "./app.js";
import { render } from "./render.js";

const ALT_SCREEN_ON = "\x1b[?1049h";
const ALT_SCREEN_OFF = "\x1b[?1049l";
const HIDE_CURSOR = "\x1b[?25l";
const SHOW_CURSOR = "\x1b[?25h";
const CLEAR = "\x1b[H\x1b[2J";

/**
 * Runs the interactive screen until the app asks to quit. Keys are handled
 * one at a time, in order; a device action finishes before the next key.
 */
export async function runTui(
  app: App,
  input: NodeJS.ReadStream = process.stdin,
  output: NodeJS.WriteStream = process.stdout,
): Promise<void> {
  const draw = () => {
    output.write(CLEAR + render(app, output.columns || 80, output.rows || 24).join("\n"));
  };

  setSilent(true);
  output.write(ALT_SCREEN_ON + HIDE_CURSOR);
  readline.emitKeypressEvents(input);
  if (input.isTTY) input.setRawMode(true);

  const restore = () => {
    if (input.isTTY) input.setRawMode(false);
    input.pause();
    output.write(SHOW_CURSOR + ALT_SCREEN_OFF);
    setSilent(false);
  };

  try {
    draw();
    await app.refreshDevices();
    draw();
  } catch (err) {
    restore();
    throw err;
  }

  return new Promise<void>((resolve, reject) => {
    let queue: Promise<void> = Promise.resolve();

    const stop = (err?: unknown) => {
      input.off("keypress", onKey);
      output.off("resize", draw);
      restore();
      if (err === undefined) resolve();
      else reject(err);
    };

    const onKey = (str: string | undefined, key: Key | undefined) => {
      queue = queue
        .then(async () => {
          const action = await app.handleKey(str, key);
          if (action === "quit") stop();
          else draw();
        })
        .catch(stop);
    };

    input.on("keypress", onKey);
    output.on("resize", draw);
    input.resume();
  });
}
