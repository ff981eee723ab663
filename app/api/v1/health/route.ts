export { GET, OPTIONS } from "@/app/health/route";

export const runtime = "nodejs";
