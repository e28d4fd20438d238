import { describe, expect, it } from "vitest";
import { CommandFailedError, runOrThrow, shellEscape, type CommandRunner } from "../src/util/sh.js";

describe("runOrThrow", () => {
  it("returns the result of a successful command", async () => {
    const runner: CommandRunner = async () => ({ code: 0, stdout: "done\n", stderr: "" });
    await expect(runOrThrow(runner, ["true"])).resolves.toEqual({ code: 0, stdout: "done\n", stderr: "" });
  });

  it("throws with the label, argv and stderr of a failed command", async () => {
    const runner: CommandRunner = async () => ({ code: 100, stdout: "", stderr: "E: Unable to locate package" });
    const error = await runOrThrow(runner, ["apt-get", "install", "nope"], { label: "apt-get install" }).catch(
      (caught: unknown) => caught,
    );
    expect(error).toBeInstanceOf(CommandFailedError);
    expect(error instanceof CommandFailedError && error.message).toBe(
      "apt-get install: command failed (100): apt-get install nope\nE: Unable to locate package",
    );
    expect(error instanceof CommandFailedError && error.code).toBe(100);
  });
});

describe("shellEscape", () => {
  it("single-quotes values", () => {
    expect(shellEscape("plain")).toBe("'plain'");
    expect(shellEscape("it's")).toBe(`'it'"'"'s'`);
  });
});
