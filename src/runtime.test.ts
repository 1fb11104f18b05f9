import { describe, it, expect, vi } from "vitest";
import { runSource } from "./compile.js";
import { Capabilities, Environment, binary } from "./runtime.js";
import { RuntimeError } from "./errors.js";
import { float, int, text } from "./values.js";

function harness(extra: Partial<Capabilities> = {}) {
  const lines: string[] = [];
  const waitForAck = vi.fn();
  const caps: Capabilities = { writeLine: l => { lines.push(l); }, ack: { waitForAck }, ...extra };
  return { lines, waitForAck, caps };
}

async function output(src: string): Promise<string[]> {
  const h = harness();
  await runSource(src, h.caps);
  return h.lines;
}

describe("Interpreter: arithmetic", () => {
  it("evaluates strictly left to right", async () => {
    expect(await output("put 2 + 3 * 4")).toEqual(["20"]);
  });

  it("lets parentheses regroup", async () => {
    expect(await output("put 2 + (3 * 4)")).toEqual(["14"]);
  });

  it("keeps integers integral and always divides to a float", async () => {
    expect(await output("put 5 - 7; put 3 * 2; put 7 / 2; put 4 / 2; put 1.5 + 1")).toEqual(["-2", "6", "3.5", "2.0", "2.5"]);
  });

  it("concatenates when either side of '+' is text", async () => {
    expect(await output('have name = "Nova"; put "hi " + name + 1')).toEqual(["hi Nova1"]);
    expect(await output('put 1 + 2 + "x"')).toEqual(["3x"]);
  });

  it("prints comparison results as booleans", async () => {
    expect(await output('put 1 < 2; put 2 == 3; put "a" == "a"; put "b" > "a"')).toEqual(["true", "false", "true", "true"]);
  });

  it("promotes to float when one operand is a float", () => {
    expect(binary("+", int(2), float(0.5))).toEqual({ k: "Number", v: 2.5, float: true });
    expect(binary("*", int(2), int(3))).toEqual({ k: "Number", v: 6, float: false });
  });

  it("compares mixed kinds as unequal", () => {
    expect(binary("==", text("1"), int(1))).toEqual({ k: "Bool", v: false });
  });
});

describe("Interpreter: variables", () => {
  it("prints declared values", async () => {
    expect(await output("have x = 5; put x;")).toEqual(["5"]);
    expect(await output('have x = "a" + 1; put x;')).toEqual(["a1"]);
  });

  it("reads undeclared names as 0 and declared-only names as unset", async () => {
    expect(await output("put missing + 1; have x; put x")).toEqual(["1", "unset"]);
  });

  it("uses the assigned value as the expression result", async () => {
    expect(await output("have y = (x = 4) + 1; put x; put y")).toEqual(["4", "5"]);
    expect(await output("x = y = 3; put x + y")).toEqual(["6"]);
  });

  it("keeps variables in a passed environment between runs", async () => {
    const h = harness();
    const env = new Environment();
    await runSource("have total = 2", h.caps, env);
    await runSource("total = total * 10; put total", h.caps, env);
    expect(h.lines).toEqual(["20"]);
    expect(env.names()).toEqual(["total"]);
  });
});

describe("Interpreter: control flow", () => {
  it("treats empty text as true and zero as false", async () => {
    const src = 'when ("") { put "empty text" } when (0) { put "zero" } otherwise { put "no" }';
    expect(await output(src)).toEqual(["empty text", "no"]);
  });

  it("re-runs the loop body until the condition fails", async () => {
    expect(await output("have i = 0; while (i < 3) { put i; i = i + 1; }")).toEqual(["0", "1", "2"]);
  });

  it("waits for one acknowledgment per pause", async () => {
    const h = harness();
    const seen: string[][] = [];
    h.waitForAck.mockImplementation(() => { seen.push([...h.lines]); });
    await runSource('put "a"; pause("x"); put "b"; pause', h.caps);
    expect(h.waitForAck).toHaveBeenCalledTimes(2);
    expect(seen).toEqual([["a"], ["a", "b"]]);
  });

  it("evaluates the pause argument", async () => {
    expect(await output("pause(z = 5); put z")).toEqual(["5"]);
  });
});

describe("Interpreter: errors", () => {
  it("stops at division by zero after the earlier output", async () => {
    const h = harness();
    await expect(runSource("put 1; put 1 / 0; put 2", h.caps)).rejects.toMatchObject({
      kind: "DivisionByZero",
      message: "[RUN] Division by zero!",
    });
    expect(h.lines).toEqual(["1"]);
  });

  it("rejects arithmetic on text", async () => {
    await expect(output('put "a" - 1')).rejects.toMatchObject({
      kind: "UndefinedBehavior",
      message: "[RUN] Operator '-' needs numbers, got Text and Number",
    });
  });

  it("refuses to run a window", async () => {
    await expect(output('ui_window("x") { label("hi") }')).rejects.toBeInstanceOf(RuntimeError);
  });

  it("routes ui_message to the message box when one is provided", async () => {
    await expect(output('ui_message("hi")')).rejects.toMatchObject({ kind: "UndefinedBehavior" });

    const messageBox = vi.fn();
    const h = harness({ messageBox });
    await runSource('ui_message("hi " + 2)', h.caps);
    expect(messageBox).toHaveBeenCalledWith("hi 2");
  });
});
