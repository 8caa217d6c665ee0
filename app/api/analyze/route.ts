import { NextRequest } from "next/server";
import { FoodSafetyClient } from "../../../lib/food-safety/client";
import { loadConfig } from "../../../lib/food-safety/config";
import { createAnalyzeHandler } from "../../../lib/food-safety/handler";

export const runtime = "nodejs";

const handleAnalyze = createAnalyzeHandler(new FoodSafetyClient(loadConfig()));

export async function POST(req: NextRequest) {
  return handleAnalyze(req);
}
