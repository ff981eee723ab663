export { OPTIONS, POST } from "@/app/agent/analyze/route";

export const runtime = "nodejs";
