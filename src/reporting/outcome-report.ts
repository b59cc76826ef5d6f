import fs from "fs";
import path from "path";
import { createCanvas } from "@napi-rs/canvas";
import type { SKRSContext2D } from "@napi-rs/canvas";
import type { TradeDecision } from "../types";
import { logger, describeError } from "../utils/logger";

export type OutcomePoint = {
  timestampMs: number;
  profitLoss: number;
  cumulativeProfitLoss: number;
};

export interface OutcomeReportPaths {
  csvPath: string;
  pngPath: string;
  points: number;
}

/**
 * Cumulative profit/loss of reflected decisions, ordered by trade time.
 */
export function buildCumulativePoints(records: TradeDecision[]): OutcomePoint[] {
  const reflected = records
    .flatMap(r => {
      const timestampMs = Date.parse(r.timestamp);
      if (r.reflection.trim() === "" || r.profitLoss === null) return [];
      if (!Number.isFinite(timestampMs)) return [];
      return [{ timestampMs, profitLoss: r.profitLoss }];
    })
    .sort((a, b) => a.timestampMs - b.timestampMs);

  let running = 0;
  return reflected.map(p => {
    running += p.profitLoss;
    return { ...p, cumulativeProfitLoss: running };
  });
}

/**
 * Write outcomes.csv and outcomes.png under `outputDir`.
 * Returns null when no decision has been reflected yet.
 */
export function renderOutcomeReport(
  records: TradeDecision[],
  outputDir: string
): OutcomeReportPaths | null {
  const points = buildCumulativePoints(records);
  if (!points.length) {
    logger.warn("[OutcomeReport] No reflected decisions yet, skipping chart");
    return null;
  }

  fs.mkdirSync(outputDir, { recursive: true });
  const csvPath = path.join(outputDir, "outcomes.csv");
  const pngPath = path.join(outputDir, "outcomes.png");

  writeCsv(csvPath, points);
  fs.writeFileSync(pngPath, drawOutcomeChart(points));
  logger.info(`[OutcomeReport] Updated: ${path.relative(process.cwd(), pngPath)}`);

  return { csvPath, pngPath, points: points.length };
}

/**
 * Report rendering runs after the batch has been persisted; a failure here
 * is logged as a warning and never fails the run.
 */
export function tryRenderOutcomeReport(
  records: TradeDecision[],
  outputDir: string
): OutcomeReportPaths | null {
  try {
    return renderOutcomeReport(records, outputDir);
  } catch (error) {
    logger.warn(`[OutcomeReport] 图表生成失败，已跳过: ${describeError(error)}`);
    return null;
  }
}

function writeCsv(csvPath: string, points: OutcomePoint[]) {
  const rows = points.map(
    p => `${Math.floor(p.timestampMs)},${p.profitLoss},${p.cumulativeProfitLoss}`
  );
  const body = ["timestamp_ms,profit_loss,cumulative_profit_loss", ...rows].join("\n");
  fs.writeFileSync(csvPath, body + "\n", "utf8");
}

const WIDTH = 1000;
const HEIGHT = 500;
const PAD = 60;

// One bar per reflected trade (green/red), cumulative line on top, both in %.
function drawOutcomeChart(points: OutcomePoint[]): Buffer {
  const canvas = createCanvas(WIDTH, HEIGHT);
  const ctx = canvas.getContext("2d");
  ctx.fillStyle = "#ffffff";
  ctx.fillRect(0, 0, WIDTH, HEIGHT);

  const series = points.flatMap(p => [p.profitLoss * 100, p.cumulativeProfitLoss * 100]);
  const lo = Math.min(0, ...series);
  const hi = Math.max(0, ...series);
  const range = hi - lo || 1;
  const y = (pct: number) => HEIGHT - PAD - ((pct - lo) / range) * (HEIGHT - 2 * PAD);
  const slot = (WIDTH - 2 * PAD) / points.length;
  const x = (i: number) => PAD + slot * (i + 0.5);

  drawBaseline(ctx, y(0), `${lo.toFixed(1)}% .. ${hi.toFixed(1)}%`);

  const barWidth = Math.max(2, slot * 0.6);
  points.forEach((p, i) => {
    const top = y(Math.max(0, p.profitLoss * 100));
    const bottom = y(Math.min(0, p.profitLoss * 100));
    ctx.fillStyle = p.profitLoss >= 0 ? "#86efac" : "#fca5a5";
    ctx.fillRect(x(i) - barWidth / 2, top, barWidth, Math.max(1, bottom - top));
  });

  ctx.strokeStyle = "#1d4ed8";
  ctx.lineWidth = 2;
  ctx.beginPath();
  points.forEach((p, i) => {
    const py = y(p.cumulativeProfitLoss * 100);
    if (i === 0) ctx.moveTo(x(i), py);
    else ctx.lineTo(x(i), py);
  });
  ctx.stroke();

  ctx.fillStyle = "#111827";
  ctx.font = "16px sans-serif";
  ctx.fillText(
    `Reflected trades: ${points.length}  |  cumulative P/L ${(
      points[points.length - 1].cumulativeProfitLoss * 100
    ).toFixed(2)}%`,
    PAD,
    PAD / 2
  );

  return canvas.toBuffer("image/png");
}

function drawBaseline(ctx: SKRSContext2D, zeroY: number, rangeLabel: string) {
  ctx.strokeStyle = "#9ca3af";
  ctx.lineWidth = 1;
  ctx.beginPath();
  ctx.moveTo(PAD, zeroY);
  ctx.lineTo(WIDTH - PAD, zeroY);
  ctx.stroke();

  ctx.fillStyle = "#6b7280";
  ctx.font = "12px sans-serif";
  ctx.fillText(rangeLabel, PAD, HEIGHT - PAD / 3);
}
