import { NextResponse } from "next/server";
import { z } from "zod";
import { MalformedInputError, presentSession, uploadCsv } from "../../../../lib/expenses";
import { getSessionStore } from "../../../../lib/server/sessions";

const BodySchema = z.object({
  sessionId: z.string().min(1),
  csv: z.string(),
});

export async function POST(req: Request) {
  const parsed = BodySchema.safeParse(await req.json().catch(() => null));
  if (!parsed.success) {
    return NextResponse.json({ error: "Invalid request body" }, { status: 400 });
  }

  try {
    const session = uploadCsv(getSessionStore(), parsed.data.sessionId, parsed.data.csv);
    if (!session) {
      return NextResponse.json({ error: "Session not found" }, { status: 404 });
    }
    return NextResponse.json(presentSession(session));
  } catch (err) {
    if (err instanceof MalformedInputError) {
      return NextResponse.json(
        { error: `An error occurred while reading the file: ${err.message}` },
        { status: 400 }
      );
    }
    console.error("CSV upload failed:", err);
    return NextResponse.json({ error: "Failed to read the uploaded file" }, { status: 500 });
  }
}
