import * as fs from "fs";
import * as path from "path";
import { InvestmentPlanner } from "./src/planner/investmentPlanner";
import { PriceSeries, fromDatedPrices } from "./src/models/PriceSeries";
import { isAnalyticsError } from "./src/models/errors";
import { RecommendRequestSchema } from "./src/utils/validation";
import { horizonFromTargetDate } from "./src/utils/time";
import { isReportFormat, selectReportSink } from "./src/report/reportSink";

/**
 * Rank the instruments in an input file, plan contributions for the winner and
 * print the report.
 * Usage: npx ts-node run-planning.ts [input-file] [text|json]
 * Default input: example-request.json, default format: text
 */
const inputPath = process.argv[2] ?? "example-request.json";
const format = process.argv[3] ?? "text";

if (!isReportFormat(format)) {
  console.error(`Unknown report format "${format}". Use "text" or "json".`);
  process.exit(1);
}

let inputData: unknown;
try {
  const raw = fs.readFileSync(path.resolve(inputPath), "utf-8");
  inputData = JSON.parse(raw);
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Failed to read or parse input file "${inputPath}": ${message}`);
  process.exit(1);
}

const parsed = RecommendRequestSchema.safeParse(inputData);
if (!parsed.success) {
  console.error("Input file must contain instruments, goalAmount, and one of horizonYears or targetDate.");
  for (const issue of parsed.error.issues) {
    console.error(`  ${issue.path.join(".")}: ${issue.message}`);
  }
  process.exit(1);
}

const sink = selectReportSink(format);

try {
  const data = parsed.data;
  const horizonYears =
    data.targetDate !== undefined
      ? horizonFromTargetDate(data.targetDate, Date.now())
      : data.horizonYears ?? 0;

  const instruments: Record<string, PriceSeries> = {};
  for (const [id, series] of Object.entries(data.instruments)) {
    instruments[id] = fromDatedPrices(series);
  }

  const planner = new InvestmentPlanner({
    instruments,
    goalAmount: data.goalAmount,
    horizonYears,
    zeroReturnFallback: data.zeroReturnFallback,
  });

  console.log(sink.write({ ...planner.recommend(), targetDate: data.targetDate }));
} catch (err) {
  if (isAnalyticsError(err)) {
    console.error(`${err.kind}: ${err.message}`);
    process.exit(1);
  }
  throw err;
}
