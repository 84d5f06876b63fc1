import "dotenv/config";

import { analyzeChart } from "./oracle/chart/analyzeChart.js";
import { InvalidChartError } from "./oracle/chart/errors.js";
import { parseChartFromGanZhi } from "./oracle/chart/parseChart.js";
import { GenderSchema, type Gender } from "./bazi/schemas/chart.schema.js";

function parseArgs(): { pillars: string[]; gender: Gender } {
  const args = process.argv.slice(2);
  const pillars: string[] = [];
  let gender: Gender = "male";

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--gender" && i + 1 < args.length) {
      const parsed = GenderSchema.safeParse(args[i + 1]);
      if (!parsed.success) {
        throw new Error("--gender must be male or female");
      }
      gender = parsed.data;
      i++;
    } else {
      pillars.push(arg);
    }
  }

  return { pillars, gender };
}

/** Usage: run-reading.ts 庚午 辛巳 甲子 丙寅 [--gender female] */
function main() {
  const { pillars, gender } = parseArgs();
  const chart = parseChartFromGanZhi(pillars, gender);
  const reading = analyzeChart(chart);
  console.log(JSON.stringify(reading, null, 2));
}

if (process.argv[1]) {
  const invokedPath = (() => {
    try {
      return new URL(`file://${process.argv[1]}`).href;
    } catch {
      return undefined;
    }
  })();
  if (invokedPath && invokedPath === import.meta.url) {
    try {
      main();
    } catch (err) {
      console.error(err instanceof InvalidChartError ? err.message : err);
      process.exit(1);
    }
  }
}
