import { NextResponse } from "next/server";
import { z } from "zod";
import { categorizeSession, presentResult, type PipelineDeps } from "../../../../lib/expenses";
import { getPipelineDeps, getSessionStore } from "../../../../lib/server/sessions";

const BodySchema = z.object({
  sessionId: z.string().min(1),
});

export async function POST(req: Request) {
  const parsed = BodySchema.safeParse(await req.json().catch(() => null));
  if (!parsed.success) {
    return NextResponse.json({ error: "Invalid request body" }, { status: 400 });
  }

  let deps: PipelineDeps;
  try {
    deps = getPipelineDeps();
  } catch (err) {
    console.error("Generation service is not configured:", err);
    return NextResponse.json(
      { error: err instanceof Error ? err.message : "Generation service is not configured" },
      { status: 500 }
    );
  }

  const result = await categorizeSession(getSessionStore(), parsed.data.sessionId, deps);
  if (!result) {
    return NextResponse.json({ error: "Session not found" }, { status: 404 });
  }
  return NextResponse.json(presentResult(result));
}
