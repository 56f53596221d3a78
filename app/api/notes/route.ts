import { createNotesHandler } from "@/lib/http/notes-handler";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const POST = createNotesHandler();
