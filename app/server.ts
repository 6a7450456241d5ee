/**
 * Run-control HTTP surface.
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { z } from "zod";
import { describeError } from "@/lib/agent/errors";
import type { RunRegistry } from "@/lib/runs/registry";
import { MISSING_REPORT_MESSAGE, type RunRunner } from "@/lib/runs/runner";

export const MAX_PAPER_LIMIT = 20;

export const ResearchBody = z.object({
  topic: z.string().trim().min(1, "Topic must not be blank"),
  paperLimit: z.number().int().min(1).max(MAX_PAPER_LIMIT).optional(),
});

export function createApp(deps: {
  registry: RunRegistry;
  runner: Pick<RunRunner, "start">;
}) {
  const { registry, runner } = deps;
  const app = new Hono();

  // any origin, including "null" from file:// pages
  app.use("*", cors());

  app.onError((err, c) => {
    console.error(`[server] ${c.req.method} ${c.req.path} failed: ${describeError(err)}`);
    return c.json({ error: "Internal server error" }, 500);
  });

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.post("/research", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "Request body must be JSON", issues: [] }, 400);
    }

    const parsed = ResearchBody.safeParse(body);
    if (!parsed.success) {
      return c.json(
        {
          error: "Invalid request body",
          issues: parsed.error.issues.map((issue) => ({
            path: issue.path.join("."),
            message: issue.message,
          })),
        },
        400
      );
    }

    // `done` settles on its own and never rejects
    const { runId } = runner.start(parsed.data);
    return c.json({ message: "Literature review started.", runId }, 202);
  });

  app.get("/research/:runId", (c) => {
    const run = registry.get(c.req.param("runId"));
    if (!run) return c.json({ error: "Run not found" }, 404);
    return c.json(run);
  });

  app.get("/research/:runId/report", async (c) => {
    const run = registry.get(c.req.param("runId"));
    if (!run) return c.json({ error: "Run not found" }, 404);

    if (run.status === "pending" || run.status === "running") {
      return c.json({ status: run.status, message: "Report is not ready yet." }, 409);
    }
    if (run.status === "failed") {
      return c.json({ status: "failed", message: run.errorMessage ?? MISSING_REPORT_MESSAGE }, 500);
    }
    if (!run.artifactPath) {
      return c.json({ status: run.status, message: MISSING_REPORT_MESSAGE }, 500);
    }

    let bytes: Buffer;
    try {
      bytes = await readFile(run.artifactPath);
    } catch (err) {
      console.error(`[server] Report for ${run.runId} unreadable: ${describeError(err)}`);
      return c.json({ status: run.status, message: "Report file not found on the server." }, 500);
    }

    return new Response(bytes, {
      status: 200,
      headers: {
        "Content-Type": "text/html; charset=utf-8",
        "Content-Disposition": `attachment; filename="${basename(run.artifactPath)}"`,
      },
    });
  });

  return app;
}
