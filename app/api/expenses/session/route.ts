import { NextResponse } from "next/server";
import { z } from "zod";
import { presentSession } from "../../../../lib/expenses";
import { getSessionStore } from "../../../../lib/server/sessions";

const BudgetSchema = z.number().finite().min(0);

const CreateBodySchema = z
  .object({
    budget: BudgetSchema.optional(),
  })
  .optional();

const PatchBodySchema = z.object({
  sessionId: z.string().min(1),
  budget: BudgetSchema,
});

function sessionIdFrom(req: Request): string | null {
  const id = new URL(req.url).searchParams.get("sessionId");
  return id && id.trim() ? id.trim() : null;
}

export async function GET(req: Request) {
  const sessionId = sessionIdFrom(req);
  if (!sessionId) {
    return NextResponse.json({ error: "Missing sessionId" }, { status: 400 });
  }

  const session = getSessionStore().get(sessionId);
  if (!session) {
    return NextResponse.json({ error: "Session not found" }, { status: 404 });
  }
  return NextResponse.json(presentSession(session));
}

export async function POST(req: Request) {
  const parsed = CreateBodySchema.safeParse(await req.json().catch(() => undefined));
  if (!parsed.success) {
    return NextResponse.json({ error: "Invalid request body" }, { status: 400 });
  }

  const session = getSessionStore().create({ budget: parsed.data?.budget });
  return NextResponse.json(presentSession(session), { status: 201 });
}

export async function PATCH(req: Request) {
  const parsed = PatchBodySchema.safeParse(await req.json().catch(() => null));
  if (!parsed.success) {
    return NextResponse.json({ error: "Budget must be a non-negative number" }, { status: 400 });
  }

  const session = getSessionStore().setBudget(parsed.data.sessionId, parsed.data.budget);
  if (!session) {
    return NextResponse.json({ error: "Session not found" }, { status: 404 });
  }
  return NextResponse.json(presentSession(session));
}

export async function DELETE(req: Request) {
  const sessionId = sessionIdFrom(req);
  if (!sessionId) {
    return NextResponse.json({ error: "Missing sessionId" }, { status: 400 });
  }

  const discarded = getSessionStore().discard(sessionId);
  if (!discarded) {
    return NextResponse.json({ error: "Session not found" }, { status: 404 });
  }
  return NextResponse.json({ ok: true });
}
