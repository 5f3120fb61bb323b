import { describe, it, expect, vi } from "vitest";
import { createProgram, type CommandHandlers } from "../src/index.js";

function makeHandlers(): CommandHandlers {
  return {
    generateCommand: vi.fn(async () => null),
    watchCommand: vi.fn(async () => {}),
    removeCommand: vi.fn(async () => []),
  };
}

async function parse(programArgs: string[], handlers: CommandHandlers): Promise<void> {
  const program = createProgram(handlers);
  program.configureOutput({ writeOut: () => {}, writeErr: () => {} });
  await program.parseAsync(programArgs);
}

describe("CLI wiring", () => {
  it("generate passes the source arguments and flags", async () => {
    const handlers = makeHandlers();
    await parse(
      ["node", "mockwright", "generate", "./store", "Inventory", "Repo", "--output-dir", "test/mocks", "--package", "doubles", "-m"],
      handlers,
    );
    expect(handlers.generateCommand).toHaveBeenCalledWith(
      ["./store", "Inventory", "Repo"],
      expect.objectContaining({
        outputDir: "test/mocks",
        packageName: "doubles",
        generateMatchers: true,
      }),
    );
  });

  it("generate maps the single-file flags", async () => {
    const handlers = makeHandlers();
    await parse(
      ["node", "mockwright", "generate", "src/store.ts", "-o", "store.mock.ts", "--syntactic", "-d", "--self-package", "./src/store", "-p", "argmatchers"],
      handlers,
    );
    expect(handlers.generateCommand).toHaveBeenCalledWith(["src/store.ts"], {
      output: "store.mock.ts",
      outputDir: undefined,
      packageName: undefined,
      selfPackage: "./src/store",
      debug: true,
      generateMatchers: undefined,
      matchersDir: "argmatchers",
      syntactic: true,
    });
  });

  it("generate accepts --self_package as a spelling of --self-package", async () => {
    const handlers = makeHandlers();
    await parse(["node", "mockwright", "generate", "./store", "Inventory", "--self_package", "./store"], handlers);
    expect(handlers.generateCommand).toHaveBeenCalledWith(
      ["./store", "Inventory"],
      expect.objectContaining({ selfPackage: "./store" }),
    );
  });

  it("watch passes directories and options", async () => {
    const handlers = makeHandlers();
    await parse(["node", "mockwright", "watch", "src", "lib", "-r", "--interval", "500"], handlers);
    expect(handlers.watchCommand).toHaveBeenCalledWith(["src", "lib"], { recursive: true, interval: "500" });
  });

  it("watch defaults to no directories", async () => {
    const handlers = makeHandlers();
    await parse(["node", "mockwright", "watch"], handlers);
    expect(handlers.watchCommand).toHaveBeenCalledWith([], { recursive: undefined, interval: undefined });
  });

  it("remove maps its short flags", async () => {
    const handlers = makeHandlers();
    await parse(["node", "mockwright", "remove", "src", "-r", "-n", "-d", "-s"], handlers);
    expect(handlers.removeCommand).toHaveBeenCalledWith("src", {
      recursive: true,
      nonInteractive: true,
      dryRun: true,
      silent: true,
    });
  });

  it("remove without a path", async () => {
    const handlers = makeHandlers();
    await parse(["node", "mockwright", "remove"], handlers);
    expect(handlers.removeCommand).toHaveBeenCalledWith(undefined, expect.objectContaining({ recursive: undefined }));
  });
});
