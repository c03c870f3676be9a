import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { Logger } from "@rawecho/kernel";
import { GREETING } from "@rawecho/echo";
import { createEventLoopAdapter } from "@rawecho/loop";
import { createMemoryLoop } from "@rawecho/loop/testing";
import { Renderer, type OutputStream } from "../ui/renderer.js";
import { EXIT_OK, EXIT_SESSION_ERROR, EXIT_USAGE, echoCommand } from "./echo.js";

class Sink implements OutputStream {
  text = "";

  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}

describe("echoCommand", () => {
  let dir: string;
  let output: Sink;
  let errors: Sink;
  let renderer: Renderer;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "rawecho-cli-"));
    output = new Sink();
    errors = new Sink();
    renderer = new Renderer({ colors: false, output, errors });
  });

  afterEach(() => {
    Logger.configure({ level: "silent" });
    rmSync(dir, { recursive: true, force: true });
  });

  function context(loop = createMemoryLoop()) {
    return {
      adapter: createEventLoopAdapter(loop),
      renderer,
      env: {},
      configPath: join(dir, "missing.json"),
    };
  }

  it("exits 0 after a clean session", async () => {
    const loop = createMemoryLoop().feed("ok\x03");

    await expect(echoCommand({}, context(loop))).resolves.toBe(EXIT_OK);
    expect(loop.output()).toBe(`${GREETING}ok^C\0`);
    expect(output.text).toBe("");
  });

  it("prints the first error and exits 1", async () => {
    const loop = createMemoryLoop({ terminal: false });

    await expect(echoCommand({}, context(loop))).resolves.toBe(EXIT_SESSION_ERROR);
    expect(output.text).toBe("Error calling set_raw_mode: inappropriate ioctl for device (ENOTTY)\n");
  });

  it("exits 2 on a bad flag without touching the terminal", async () => {
    const loop = createMemoryLoop();

    await expect(echoCommand({ inputFd: "x" }, context(loop))).resolves.toBe(EXIT_USAGE);
    expect(errors.text).toMatch(/^Error: inputFd: /);
    expect(loop.modeChanges).toEqual([]);
  });

  it("honours the configured descriptors", async () => {
    const loop = createMemoryLoop().feed("\x03");

    await echoCommand({ inputFd: "7", outputFd: "8" }, context(loop));
    expect(loop.closedFds).toEqual([7, 8]);
  });

  it("removes its signal handlers when done", async () => {
    const before = [process.listenerCount("SIGTERM"), process.listenerCount("SIGHUP")];

    await echoCommand({}, context(createMemoryLoop().feed("\x03")));
    expect([process.listenerCount("SIGTERM"), process.listenerCount("SIGHUP")]).toEqual(before);
  });

  it("writes logs to the configured file", async () => {
    const logFile = join(dir, "rawecho.log");

    await echoCommand({ logLevel: "info", logFile }, context(createMemoryLoop().feed("\x03")));

    const [first] = readFileSync(logFile, "utf-8").trim().split("\n");
    expect(JSON.parse(first)).toMatchObject({
      name: "rawecho",
      component: "cli",
      msg: "starting echo session",
      inputFd: 0,
      outputFd: 1,
    });
    expect(Logger.level).toBe("info");
  });
});
