import { NextResponse } from "next/server";
import { z } from "zod";
import { MalformedInputError, editTable, presentSession } from "../../../../lib/expenses";
import { getSessionStore } from "../../../../lib/server/sessions";

const BodySchema = z.object({
  sessionId: z.string().min(1),
  rows: z.unknown(),
});

export async function PUT(req: Request) {
  const parsed = BodySchema.safeParse(await req.json().catch(() => null));
  if (!parsed.success) {
    return NextResponse.json({ error: "Invalid request body" }, { status: 400 });
  }

  try {
    const session = editTable(getSessionStore(), parsed.data.sessionId, parsed.data.rows);
    if (!session) {
      return NextResponse.json({ error: "Session not found" }, { status: 404 });
    }
    return NextResponse.json(presentSession(session));
  } catch (err) {
    if (err instanceof MalformedInputError) {
      return NextResponse.json({ error: err.message }, { status: 400 });
    }
    console.error("Table edit failed:", err);
    return NextResponse.json({ error: "Failed to update the table" }, { status: 500 });
  }
}
