import { Worker } from "node:worker_threads";

/**
 * Host functions the bridge relays to. They only ever receive and return
 * strings, and never throw into the context:
 *   "V<json>" value, "V" undefined, "E<message>" error.
 */
export interface BridgeHost {
  call(op: unknown, payload: unknown): string;
  callAsync(op: unknown, payload: unknown): Promise<string>;
}

export interface BridgeOptions {
  inputsJson: string;
  exposeTools: boolean;
  /** Wrapped step code, evaluated as one script */
  code: string;
  filename: string;
  /** Epoch ms after which checkpoints consult the host */
  deadline: number;
  timeoutMs: number;
  /** Old-generation heap of the worker running the step */
  memoryLimitMb: number;
}

/**
 * How the worker ended. `settled` carries the settle tag of the step's
 * promise.
 */
export type BridgeOutcome =
  | { kind: "settled"; tagged: string }
  | { kind: "timeout" }
  | { kind: "out-of-memory" }
  | { kind: "crashed"; message: string };

export interface BridgeWorker {
  readonly outcome: Promise<BridgeOutcome>;
  terminate(): Promise<void>;
}

/** Largest reply a synchronous bridge call can carry */
const SYNC_REPLY_BYTES = 1024 * 1024;
/** control[0]: reply ready flag, control[1]: reply length */
const CONTROL_BYTES = 8;

/**
 * Runs inside the context before any step code. Captures the intrinsics it
 * relies on, installs the sandbox globals as non-writable bindings and
 * returns the settle function. Everything crossing the boundary is a string.
 *
 * settle tags: "V<json>" output, "X<message>" output not serialisable,
 * "E<json {name,message,stack}>" thrown.
 */
const BRIDGE_SOURCE = String.raw`(function (hostCall, hostCallAsync, hostCheckpoint, inputsJson, exposeTools) {
  "use strict";
  const parse = JSON.parse;
  const stringify = JSON.stringify;
  const then = Promise.prototype.then;
  const slice = Array.prototype.slice;
  const PromiseCtor = Promise;
  const ErrorCtor = Error;
  const freeze = Object.freeze;
  const defineProperty = Object.defineProperty;
  const keys = Object.keys;
  const toText = String;

  function unwrap(tagged) {
    if (typeof tagged !== "string" || tagged.length === 0) return undefined;
    if (tagged[0] === "E") throw new ErrorCtor(tagged.slice(1));
    return tagged.length > 1 ? parse(tagged.slice(1)) : undefined;
  }

  function callSync(op, payload) {
    return unwrap(hostCall(op, payload));
  }

  function callAsync(op, payload) {
    return new PromiseCtor(function (resolve, reject) {
      const refused = hostCallAsync(op, payload, function (tagged) {
        try {
          resolve(unwrap(tagged));
        } catch (error) {
          reject(error);
        }
      });
      if (refused !== "") {
        try {
          unwrap(refused);
        } catch (error) {
          reject(error);
        }
      }
    });
  }

  function checkpoint() {
    const verdict = hostCheckpoint();
    if (verdict !== "") throw new ErrorCtor(verdict);
  }

  function format(args) {
    let line = "";
    for (let i = 0; i < args.length; i++) {
      const value = args[i];
      let text;
      if (typeof value === "string") {
        text = value;
      } else {
        try {
          text = stringify(value);
        } catch (error) {
          text = undefined;
        }
        if (text === undefined) text = toText(value);
      }
      line += (i > 0 ? " " : "") + text;
    }
    return line;
  }

  const sandboxConsole = {};
  const levels = ["log", "info", "warn", "error", "debug"];
  for (let i = 0; i < levels.length; i++) {
    const level = levels[i];
    sandboxConsole[level] = function () {
      hostCall("log", stringify([level, format(arguments)]));
    };
  }

  const moduleCache = {};
  function makeModule(name, shape) {
    function invoke(member, args) {
      return callSync("module", stringify([name, member, slice.call(args)]));
    }
    const target = shape.callable ? function () { return invoke("", arguments); } : {};
    for (let i = 0; i < shape.functions.length; i++) {
      const member = shape.functions[i];
      target[member] = function () { return invoke(member, arguments); };
    }
    const constantNames = keys(shape.constants);
    for (let i = 0; i < constantNames.length; i++) {
      target[constantNames[i]] = shape.constants[constantNames[i]];
    }
    return freeze(target);
  }

  function sandboxRequire(name) {
    if (typeof name !== "string") throw new TypeError("require() expects a module name");
    if (moduleCache[name] === undefined) {
      moduleCache[name] = makeModule(name, callSync("require", name));
    }
    return moduleCache[name];
  }

  const files = freeze({
    read: function (path) {
      return callAsync("files.read", stringify({ path: path }));
    },
    write: function (path, text) {
      return callAsync("files.write", stringify({ path: path, text: text }));
    },
    list: function (path) {
      return callAsync("files.list", stringify({ path: path === undefined ? "." : path }));
    },
  });

  const tools = freeze({
    call: function (name, args) {
      return callAsync("tools.call", stringify({ name: name, args: args === undefined ? {} : args }));
    },
  });

  function sleep(ms) {
    return callAsync("sleep", stringify(Number(ms) || 0));
  }

  function describe(error) {
    try {
      if (error !== null && typeof error === "object") {
        return stringify({
          name: typeof error.name === "string" ? error.name : "Error",
          message: typeof error.message === "string" ? error.message : toText(error),
          stack: typeof error.stack === "string" ? error.stack : "",
        });
      }
      return stringify({ name: "Error", message: toText(error), stack: "" });
    } catch (failure) {
      return stringify({ name: "Error", message: "Unprintable error", stack: "" });
    }
  }

  function settle(promise, done) {
    then.call(
      promise,
      function (value) {
        let json;
        try {
          json = stringify(value === undefined ? null : value);
        } catch (error) {
          done("X" + (error && typeof error.message === "string" ? error.message : "not serialisable"));
          return;
        }
        if (typeof json !== "string") {
          done("X" + "Output of type " + typeof value + " is not serialisable");
          return;
        }
        done("V" + json);
      },
      function (error) {
        done("E" + describe(error));
      },
    );
  }

  const globals = {
    inputs: parse(inputsJson),
    console: freeze(sandboxConsole),
    require: sandboxRequire,
    files: files,
    sleep: sleep,
    __sandbox_checkpoint__: checkpoint,
  };
  if (exposeTools) globals.tools = tools;
  const names = keys(globals);
  for (let i = 0; i < names.length; i++) {
    defineProperty(globalThis, names[i], {
      value: globals[names[i]],
      writable: false,
      enumerable: false,
      configurable: false,
    });
  }

  return freeze({ settle: settle });
})`;

/**
 * Entry of the step worker. Creates the context, installs the bridge and
 * relays host calls to the parent: synchronous ones block on the shared
 * buffer until the parent has written the reply.
 */
const WORKER_SOURCE = String.raw`"use strict";
const { parentPort, workerData } = require("node:worker_threads");
const vm = require("node:vm");

const options = workerData;
const control = new Int32Array(options.shared, 0, 2);
const replyBytes = new Uint8Array(options.shared, ${CONTROL_BYTES});
const decoder = new TextDecoder();
const pending = new Map();
let nextId = 0;

function hostCall(op, payload) {
  if (typeof op !== "string" || typeof payload !== "string") return "EInvalid sandbox call";
  if (op === "log") {
    parentPort.postMessage({ type: "log", payload: payload });
    return "V";
  }
  Atomics.store(control, 0, 0);
  parentPort.postMessage({ type: "call", op: op, payload: payload });
  Atomics.wait(control, 0, 0);
  return decoder.decode(replyBytes.slice(0, Atomics.load(control, 1)));
}

function hostCallAsync(op, payload, callback) {
  if (typeof op !== "string" || typeof payload !== "string" || typeof callback !== "function") {
    return "EInvalid sandbox call";
  }
  nextId += 1;
  pending.set(nextId, callback);
  parentPort.postMessage({ type: "async", id: nextId, op: op, payload: payload });
  return "";
}

function hostCheckpoint() {
  return Date.now() > options.deadline ? hostCall("checkpoint", "") : "";
}

parentPort.on("message", function (message) {
  const callback = pending.get(message.id);
  if (callback === undefined) return;
  pending.delete(message.id);
  try {
    callback(message.tagged);
  } catch (error) {
    parentPort.postMessage({ type: "log", payload: JSON.stringify(["debug", "Sandbox callback threw"]) });
  }
});

function main() {
  const context = vm.createContext(
    {},
    { name: "agent-flow step", codeGeneration: { strings: false, wasm: false } },
  );
  const factory = vm.runInContext(options.bridgeSource, context, { filename: "sandbox-bridge.js" });
  const bridge = factory(hostCall, hostCallAsync, hostCheckpoint, options.inputsJson, options.exposeTools);
  let promise;
  try {
    const script = new vm.Script(options.code, { filename: options.filename });
    promise = script.runInContext(context, { timeout: Math.max(1, options.timeoutMs) });
  } catch (error) {
    if (error !== null && typeof error === "object" && error.code === "ERR_SCRIPT_EXECUTION_TIMEOUT") {
      parentPort.postMessage({ type: "timeout" });
      return;
    }
    const message = error !== null && typeof error === "object" ? String(error.message) : String(error);
    parentPort.postMessage({
      type: "settled",
      tagged: "E" + JSON.stringify({ name: "Error", message: message, stack: "" }),
    });
    return;
  }
  bridge.settle(promise, function (tagged) {
    parentPort.postMessage({ type: "settled", tagged: typeof tagged === "string" ? tagged : "XSettlement was not a string" });
  });
}

main();
`;

type WorkerMessage =
  | { type: "log"; payload: string }
  | { type: "call"; op: string; payload: string }
  | { type: "async"; id: number; op: string; payload: string }
  | { type: "settled"; tagged: string }
  | { type: "timeout" };

function readMessage(value: unknown): WorkerMessage | undefined {
  if (value === null || typeof value !== "object") return undefined;
  const get = (key: string): unknown => Reflect.get(value, key);
  const type = get("type");
  const op = get("op");
  const payload = get("payload");
  const id = get("id");
  const tagged = get("tagged");
  switch (type) {
    case "log":
      return typeof payload === "string" ? { type, payload } : undefined;
    case "call":
      return typeof op === "string" && typeof payload === "string" ? { type, op, payload } : undefined;
    case "async":
      return typeof id === "number" && typeof op === "string" && typeof payload === "string"
        ? { type, id, op, payload }
        : undefined;
    case "settled":
      return typeof tagged === "string" ? { type, tagged } : undefined;
    case "timeout":
      return { type };
    default:
      return undefined;
  }
}

/**
 * Start a worker that evaluates the step code in a fresh context, with its
 * heap capped at `memoryLimitMb`. Host calls from the context reach `host`
 * on this thread; the outcome resolves once, on settlement, script timeout,
 * heap exhaustion or an unexpected exit.
 */
export function launchBridge(host: BridgeHost, options: BridgeOptions): BridgeWorker {
  const shared = new SharedArrayBuffer(CONTROL_BYTES + SYNC_REPLY_BYTES);
  const control = new Int32Array(shared, 0, 2);
  const replyBytes = new Uint8Array(shared, CONTROL_BYTES);
  const encoder = new TextEncoder();

  const worker = new Worker(WORKER_SOURCE, {
    eval: true,
    workerData: {
      shared,
      bridgeSource: BRIDGE_SOURCE,
      code: options.code,
      filename: options.filename,
      inputsJson: options.inputsJson,
      exposeTools: options.exposeTools,
      deadline: options.deadline,
      timeoutMs: options.timeoutMs,
    },
    resourceLimits: { maxOldGenerationSizeMb: options.memoryLimitMb },
  });
  let exited = false;

  const reply = (tagged: string) => {
    let bytes = encoder.encode(tagged);
    if (bytes.length > replyBytes.length) {
      bytes = encoder.encode(`EBridge reply of ${bytes.length} bytes exceeds ${replyBytes.length} bytes`);
    }
    replyBytes.set(bytes);
    Atomics.store(control, 1, bytes.length);
    Atomics.store(control, 0, 1);
    Atomics.notify(control, 0);
  };

  const outcome = new Promise<BridgeOutcome>((resolve) => {
    worker.on("message", (value: unknown) => {
      const message = readMessage(value);
      if (!message) return;
      switch (message.type) {
        case "log":
          host.call("log", message.payload);
          break;
        case "call":
          reply(host.call(message.op, message.payload));
          break;
        case "async": {
          const { id } = message;
          const deliver = (tagged: string) => {
            if (!exited) worker.postMessage({ id, tagged });
          };
          void host.callAsync(message.op, message.payload).then(deliver, (error: unknown) => {
            deliver(`E${error instanceof Error ? error.message : String(error)}`);
          });
          break;
        }
        case "settled":
          resolve({ kind: "settled", tagged: message.tagged });
          break;
        case "timeout":
          resolve({ kind: "timeout" });
          break;
      }
    });
    worker.on("error", (error: Error) => {
      const code = "code" in error ? error.code : undefined;
      resolve(
        code === "ERR_WORKER_OUT_OF_MEMORY"
          ? { kind: "out-of-memory" }
          : { kind: "crashed", message: error.message },
      );
    });
    worker.on("exit", (exitCode: number) => {
      exited = true;
      resolve({ kind: "crashed", message: `Sandbox worker exited with code ${exitCode}` });
    });
  });

  return {
    outcome,
    async terminate() {
      await worker.terminate();
    },
  };
}
