import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import {
  afterAll,
  afterEach,
  beforeAll,
  beforeEach,
  describe,
  expect,
  type Mock,
  type MockInstance,
  test,
  vi,
} from "vitest";
import { cleanupCommand } from "../../src/cli/commands/cleanup";
import { listCommand } from "../../src/cli/commands/list";
import { setLogLevel } from "../../src/utils/logger";

const SERVER = "http://chronos.test:4400";

/**
 * Fetch stand-in for a Chronos server: lists `running` and fails the
 * DELETE endpoints listed in `failing`.
 */
function chronosStub(running: string[], failing: string[] = []): Mock<typeof fetch> {
  return vi.fn<typeof fetch>(async (input, init) => {
    const url = String(input);
    const endpoint = url.slice(SERVER.length);

    if (init?.method === "GET" && endpoint === "/scheduler/jobs") {
      return new Response(JSON.stringify(running.map((name) => ({ name }))), { status: 200 });
    }
    if (init?.method === "DELETE" && failing.includes(endpoint)) {
      return new Response("kaboom", { status: 500 });
    }
    if (init?.method === "DELETE") {
      return new Response(null, { status: 204 });
    }
    return new Response("not found", { status: 404 });
  });
}

describe("CLI commands", () => {
  let tempDir: string;
  let soaDir: string;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;
  let baseArgs: string[];

  const printed = (): string[] => consoleLogSpy.mock.calls.map((call) => String(call[0]));

  beforeAll(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "chronos-reaper-cli-"));
    soaDir = path.join(tempDir, "services");
    await mkdir(path.join(soaDir, "svc"), { recursive: true });
    await writeFile(
      path.join(soaDir, "svc", "chronos-testcluster.yaml"),
      "jobX:\n  schedule: R/2026-01-01T00:00:00Z/PT1H\n",
    );
    baseArgs = ["--soa-dir", soaDir, "--cluster", "testcluster", "--server", SERVER, "--quiet"];
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    setLogLevel("info");
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  describe("cleanup", () => {
    test("removes orphaned jobs and exits 0", async () => {
      const fetchMock = chronosStub(["svc.jobX", "svc.jobY", "svc.jobZ"]);
      vi.stubGlobal("fetch", fetchMock);

      const code = await cleanupCommand(baseArgs);

      expect(code).toBe(0);
      expect(printed()).toEqual([
        "Successfully Removed Tasks (if any were running) for:\n  svc.jobY\n  svc.jobZ",
        "Successfully Removed Jobs:\n  svc.jobY\n  svc.jobZ",
      ]);
      expect(fetchMock.mock.calls.map(([input, init]) => `${init?.method} ${String(input)}`)).toEqual([
        `GET ${SERVER}/scheduler/jobs`,
        `DELETE ${SERVER}/scheduler/task/kill/svc.jobY`,
        `DELETE ${SERVER}/scheduler/job/svc.jobY`,
        `DELETE ${SERVER}/scheduler/task/kill/svc.jobZ`,
        `DELETE ${SERVER}/scheduler/job/svc.jobZ`,
      ]);
    });

    test("reports a failed task deletion and exits 1", async () => {
      vi.stubGlobal(
        "fetch",
        chronosStub(["svc.jobX", "svc.jobY", "svc.jobZ"], ["/scheduler/task/kill/svc.jobZ"]),
      );

      const code = await cleanupCommand(baseArgs);

      expect(code).toBe(1);
      expect(printed()).toEqual([
        "Successfully Removed Tasks (if any were running) for:\n  svc.jobY",
        "Failed to Delete Tasks for:\n  svc.jobZ",
        "Successfully Removed Jobs:\n  svc.jobY\n  svc.jobZ",
      ]);
    });

    test("prints a single line when nothing is orphaned", async () => {
      const fetchMock = chronosStub(["svc.jobX"]);
      vi.stubGlobal("fetch", fetchMock);

      const code = await cleanupCommand(baseArgs);

      expect(code).toBe(0);
      expect(printed()).toEqual(["No Chronos Jobs to remove"]);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    test("a dry run deletes nothing", async () => {
      const fetchMock = chronosStub(["svc.jobX", "svc.jobZ", "svc.jobY"]);
      vi.stubGlobal("fetch", fetchMock);

      const code = await cleanupCommand([...baseArgs, "--dry-run"]);

      expect(code).toBe(0);
      expect(printed()).toEqual(["Would Remove Jobs (dry run):\n  svc.jobY\n  svc.jobZ"]);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    test("exits 1 without deleting when the scheduler cannot be listed", async () => {
      const fetchMock = vi.fn<typeof fetch>(async () => new Response("unauthorized", { status: 401 }));
      vi.stubGlobal("fetch", fetchMock);

      const code = await cleanupCommand(baseArgs);

      expect(code).toBe(1);
      expect(printed()).toEqual([]);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    test("exits 1 when the service config directory is missing", async () => {
      const fetchMock = chronosStub(["svc.jobY"]);
      vi.stubGlobal("fetch", fetchMock);

      const code = await cleanupCommand([
        ...baseArgs,
        "--soa-dir",
        path.join(tempDir, "does-not-exist"),
      ]);

      expect(code).toBe(1);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    test("rejects an invalid concurrency", async () => {
      const fetchMock = chronosStub([]);
      vi.stubGlobal("fetch", fetchMock);

      const code = await cleanupCommand([...baseArgs, "--concurrency", "0"]);

      expect(code).toBe(1);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    test("shows help", async () => {
      const code = await cleanupCommand(["--help"]);

      expect(code).toBe(0);
      expect(printed()[0]).toContain("chronos-reaper cleanup");
    });
  });

  describe("list", () => {
    test("prints expected, running and orphaned jobs", async () => {
      const fetchMock = chronosStub(["svc.jobZ", "svc.jobX"]);
      vi.stubGlobal("fetch", fetchMock);

      const code = await listCommand(baseArgs);

      expect(code).toBe(0);
      expect(printed()).toEqual([
        "Expected Jobs:\n  svc.jobX",
        "Running Jobs:\n  svc.jobX\n  svc.jobZ",
        "Orphaned Jobs:\n  svc.jobZ",
      ]);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    test("prints only orphans with --orphans", async () => {
      vi.stubGlobal("fetch", chronosStub(["svc.jobX", "svc.jobQ"]));

      const code = await listCommand([...baseArgs, "--orphans"]);

      expect(code).toBe(0);
      expect(printed()).toEqual(["Orphaned Jobs:\n  svc.jobQ"]);
    });
  });

  describe("output streams", () => {
    const isTTY = Object.getOwnPropertyDescriptor(process.stdout, "isTTY");

    const setTTY = (value: boolean): void => {
      Object.defineProperty(process.stdout, "isTTY", { value, configurable: true });
    };

    const spyOnStdout = () => vi.spyOn(process.stdout, "write").mockImplementation(() => true);

    afterEach(() => {
      if (isTTY) {
        Object.defineProperty(process.stdout, "isTTY", isTTY);
      } else {
        Reflect.deleteProperty(process.stdout, "isTTY");
      }
    });

    test("writes only the report to stdout when not on a terminal", async () => {
      setTTY(false);
      const stdoutWriteSpy = spyOnStdout();
      vi.stubGlobal("fetch", chronosStub(["svc.jobX", "svc.jobY"]));

      const code = await cleanupCommand(baseArgs);

      expect(code).toBe(0);
      expect(stdoutWriteSpy).not.toHaveBeenCalled();
      expect(printed()).toEqual([
        "Successfully Removed Tasks (if any were running) for:\n  svc.jobY",
        "Successfully Removed Jobs:\n  svc.jobY",
      ]);
    });

    test("sends failures to stderr when not on a terminal", async () => {
      setTTY(false);
      const stdoutWriteSpy = spyOnStdout();
      vi.stubGlobal(
        "fetch",
        vi.fn<typeof fetch>(async () => new Response("unauthorized", { status: 401 })),
      );

      const code = await listCommand(baseArgs);

      expect(code).toBe(1);
      expect(stdoutWriteSpy).not.toHaveBeenCalled();
      expect(printed()).toEqual([]);
      expect(
        consoleErrorSpy.mock.calls.some((call) =>
          String(call[0]).includes(
            "List failed: Chronos API error (401) on GET /scheduler/jobs: unauthorized",
          ),
        ),
      ).toBe(true);
    });

    test("draws the session frame on a terminal", async () => {
      setTTY(true);
      const stdoutWriteSpy = spyOnStdout();
      vi.stubGlobal("fetch", chronosStub(["svc.jobX"]));

      const code = await cleanupCommand(baseArgs);

      expect(code).toBe(0);
      const written = stdoutWriteSpy.mock.calls.map((call) => String(call[0])).join("");
      expect(written).toContain("chronos-reaper cleanup");
      expect(written).toContain("Nothing to do");
    });
  });
});
