import fs from "fs/promises";
import path from "path";
import { formatFileTimestamp } from "../utils/time";

export const DEFAULT_OUTPUT_DIR = "weather_data";

export function buildResponseFileName(city: string, at: Date): string {
  const safeCity = city.trim().replace(/[^A-Za-z0-9_-]/g, "_");
  return `weather_data_${safeCity}_${formatFileTimestamp(at)}.json`;
}

export async function saveResponse(
  outputDir: string,
  city: string,
  body: unknown,
  at: Date
): Promise<string> {
  await fs.mkdir(outputDir, { recursive: true });

  const filePath = path.join(outputDir, buildResponseFileName(city, at));
  await fs.writeFile(filePath, JSON.stringify(body, null, 2));

  return filePath;
}
