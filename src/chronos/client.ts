/**
 * Chronos REST API client
 *
 * Covers the three calls reconciliation needs: listing jobs, deleting a job and
 * killing a job's tasks. Every failure (transport, HTTP status, timeout or an
 * undecodable body) is raised as a `ChronosApiError`; callers are not expected
 * to tell the causes apart.
 */

import type { ChronosConfig, ChronosJob, JobName, SchedulerClient } from "../types";
import { describeError } from "../utils/errors";
import { createLogger } from "../utils/logger";

const log = createLogger("chronos");

export class ChronosApiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChronosApiError";
  }
}

export interface ChronosClientOptions {
  username?: string;
  password?: string;
  timeoutMs?: number;
}

type HttpMethod = "GET" | "DELETE";

export function isChronosJob(value: unknown): value is ChronosJob {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string"
  );
}

export class ChronosClient implements SchedulerClient {
  private readonly servers: string[];
  private readonly timeoutMs: number;
  private readonly authorization: string | undefined;

  constructor(servers: string[], options: ChronosClientOptions = {}) {
    if (servers.length === 0) {
      throw new ChronosApiError("At least one Chronos server URL is required");
    }
    this.servers = servers.map((server) => server.replace(/\/+$/, ""));
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.authorization =
      options.username !== undefined && options.password !== undefined
        ? `Basic ${Buffer.from(`${options.username}:${options.password}`).toString("base64")}`
        : undefined;
  }

  async list(): Promise<ChronosJob[]> {
    const body = await this.call("GET", "/scheduler/jobs");
    if (!Array.isArray(body)) {
      throw new ChronosApiError("Chronos job list response is not an array");
    }

    return body.map((entry: unknown, index) => {
      if (!isChronosJob(entry)) {
        throw new ChronosApiError(`Chronos job list entry ${index} has no name`);
      }
      return entry;
    });
  }

  async delete(job: JobName): Promise<unknown> {
    return this.call("DELETE", `/scheduler/job/${encodeURIComponent(job)}`);
  }

  async deleteTasks(job: JobName): Promise<unknown> {
    return this.call("DELETE", `/scheduler/task/kill/${encodeURIComponent(job)}`);
  }

  /**
   * Try each server in turn; the first one that answers successfully wins.
   */
  private async call(method: HttpMethod, endpoint: string): Promise<unknown> {
    const failures: string[] = [];

    for (const server of this.servers) {
      try {
        return await this.request(server, method, endpoint);
      } catch (error) {
        const message = describeError(error);
        log.warn(`${method} ${server}${endpoint} failed: ${message}`);
        failures.push(message);
      }
    }

    throw new ChronosApiError(
      failures.length === 1
        ? (failures[0] ?? "Chronos request failed")
        : `All Chronos servers failed: ${failures.join("; ")}`,
    );
  }

  private async request(server: string, method: HttpMethod, endpoint: string): Promise<unknown> {
    const url = `${server}${endpoint}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.authorization) {
      headers.Authorization = this.authorization;
    }

    try {
      const response = await fetch(url, { method, headers, signal: controller.signal });
      const text = await response.text();

      if (!response.ok) {
        throw new ChronosApiError(
          `Chronos API error (${response.status}) on ${method} ${endpoint}${text ? `: ${text}` : ""}`,
        );
      }

      // Deletes answer 204 No Content
      if (text.trim() === "") {
        return null;
      }

      try {
        return JSON.parse(text);
      } catch {
        throw new ChronosApiError(`Chronos API returned invalid JSON on ${method} ${endpoint}`);
      }
    } catch (error) {
      if (error instanceof ChronosApiError) {
        throw error;
      }
      if (error instanceof Error && error.name === "AbortError") {
        throw new ChronosApiError(`Chronos API timeout after ${this.timeoutMs}ms`);
      }
      throw new ChronosApiError(`Chronos request to ${url} failed: ${describeError(error)}`);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export function createChronosClient(config: ChronosConfig): ChronosClient {
  return new ChronosClient(config.servers, {
    username: config.username,
    password: config.password,
    timeoutMs: config.timeoutMs,
  });
}
