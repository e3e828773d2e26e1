import * as d3 from "d3";
import { colorFor, colorbarStops } from "../visual/colormap.js";
import type { RenderPlan } from "./buildRenderPlan.js";

const MARGIN = { top: 50, right: 130, bottom: 60, left: 70 };
const STAR_OPACITY = 0.8;
const GLOW_SCALE = 2;
const COLORBAR = { gap: 30, width: 18 };

/** Marker sizes are areas in px^2; the drawn diameter is sqrt(size). */
export function markerRadius(size: number): number {
  return Math.sqrt(size) / 2;
}

function num(n: number): string {
  return String(Number(n.toFixed(3)));
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Render a plan to a standalone SVG document.
 *
 * Pure: no DOM, no files. Stars are drawn in plan order under the observer
 * marker; the colorbar runs from d_min (top, warm) to d_max (bottom, cool).
 */
export function renderSvgChart(plan: RenderPlan): string {
  const side = plan.size_px - MARGIN.left - MARGIN.right;
  if (side <= 0) {
    throw new Error(`chart size ${plan.size_px}px leaves no room for the plot area`);
  }

  const width = plan.size_px;
  const height = MARGIN.top + side + MARGIN.bottom;
  const plotLeft = MARGIN.left;
  const plotTop = MARGIN.top;
  const plotRight = plotLeft + side;
  const plotBottom = plotTop + side;

  const x = d3.scaleLinear().domain([plan.bounds.min, plan.bounds.max]).range([plotLeft, plotRight]);
  const y = d3.scaleLinear().domain([plan.bounds.min, plan.bounds.max]).range([plotBottom, plotTop]);
  const ticks = x.ticks(8);
  const tickFormat = x.tickFormat(8);

  const out: string[] = [];
  out.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" font-family="sans-serif">`
  );
  out.push(`<rect width="${width}" height="${height}" fill="black"/>`);

  out.push("<defs>");
  out.push(`<clipPath id="plot-area"><rect x="${plotLeft}" y="${plotTop}" width="${side}" height="${side}"/></clipPath>`);
  out.push(`<linearGradient id="distance-colorbar" x1="0" y1="0" x2="0" y2="1">`);
  for (const stop of colorbarStops()) {
    out.push(`<stop offset="${num(stop.offset)}" stop-color="${stop.color}"/>`);
  }
  out.push("</linearGradient>");
  out.push("</defs>");

  // Grid and ticks
  out.push(`<g class="grid" stroke="gray" stroke-width="0.5" stroke-dasharray="1,2" opacity="0.5">`);
  for (const t of ticks) {
    out.push(`<line x1="${num(x(t))}" y1="${plotTop}" x2="${num(x(t))}" y2="${plotBottom}"/>`);
    out.push(`<line x1="${plotLeft}" y1="${num(y(t))}" x2="${plotRight}" y2="${num(y(t))}"/>`);
  }
  out.push("</g>");

  out.push(`<g class="ticks" fill="white" font-size="12">`);
  for (const t of ticks) {
    out.push(`<text x="${num(x(t))}" y="${plotBottom + 18}" text-anchor="middle">${tickFormat(t)}</text>`);
    out.push(`<text x="${plotLeft - 8}" y="${num(y(t) + 4)}" text-anchor="end">${tickFormat(t)}</text>`);
  }
  out.push("</g>");

  out.push(`<rect class="frame" x="${plotLeft}" y="${plotTop}" width="${side}" height="${side}" fill="none" stroke="white"/>`);

  const axisLabel = escapeXml(plan.axis_label);
  out.push(`<text class="x-label" x="${plotLeft + side / 2}" y="${plotBottom + 45}" text-anchor="middle" fill="white" font-size="12">${axisLabel}</text>`);
  out.push(
    `<text class="y-label" transform="translate(${plotLeft - 50},${plotTop + side / 2}) rotate(-90)" text-anchor="middle" fill="white" font-size="12">${axisLabel}</text>`
  );
  out.push(`<text class="title" x="${plotLeft + side / 2}" y="${plotTop - 18}" text-anchor="middle" fill="white" font-size="16">${escapeXml(plan.title)}</text>`);

  // Stars, then the observer on top
  out.push(`<g class="stars" clip-path="url(#plot-area)">`);
  for (const star of plan.stars) {
    out.push(
      `<circle class="star" data-source-id="${escapeXml(star.source_id)}" cx="${num(x(star.x))}" cy="${num(y(star.y))}" r="${num(markerRadius(star.size))}" fill="${colorFor(star.color)}" fill-opacity="${STAR_OPACITY}"/>`
    );
  }
  out.push("</g>");

  const observer = plan.observer;
  const ox = num(x(observer.x));
  const oy = num(y(observer.y));
  const or = markerRadius(observer.size);
  out.push(`<g class="observer">`);
  out.push(`<circle cx="${ox}" cy="${oy}" r="${num(or * GLOW_SCALE)}" fill="${observer.glow}" fill-opacity="${observer.glow_opacity}"/>`);
  out.push(`<circle cx="${ox}" cy="${oy}" r="${num(or)}" fill="${observer.fill}"/>`);
  out.push("</g>");

  // Legend, upper right of the plot
  const legendX = plotRight - 140;
  const legendY = plotTop + 10;
  out.push(`<g class="legend" font-size="12" fill="white">`);
  out.push(`<rect x="${legendX}" y="${legendY}" width="130" height="48" fill="black" stroke="white"/>`);
  out.push(`<circle cx="${legendX + 16}" cy="${legendY + 15}" r="6" fill="${observer.fill}"/>`);
  out.push(`<text x="${legendX + 30}" y="${legendY + 19}">${escapeXml(observer.label)}</text>`);
  out.push(`<circle cx="${legendX + 16}" cy="${legendY + 34}" r="5" fill="${colorFor(0.5)}" fill-opacity="${STAR_OPACITY}"/>`);
  out.push(`<text x="${legendX + 30}" y="${legendY + 38}">Nearby Stars</text>`);
  out.push("</g>");

  // Colorbar keyed to [d_min, d_max]
  const barX = plotRight + COLORBAR.gap;
  const bar = d3.scaleLinear().domain([plan.legend.d_min, plan.legend.d_max]).range([plotTop, plotBottom]);
  const barTicks = plan.legend.d_max > plan.legend.d_min ? bar.ticks(6) : [plan.legend.d_min];
  const barFormat = d3.format(".2f");
  out.push(`<g class="colorbar" font-size="12" fill="white">`);
  out.push(`<rect x="${barX}" y="${plotTop}" width="${COLORBAR.width}" height="${side}" fill="url(#distance-colorbar)" stroke="white"/>`);
  for (const t of barTicks) {
    out.push(`<text x="${barX + COLORBAR.width + 6}" y="${num(bar(t) + 4)}">${barFormat(t)}</text>`);
  }
  out.push(
    `<text transform="translate(${barX + COLORBAR.width + 62},${plotTop + side / 2}) rotate(90)" text-anchor="middle">${escapeXml(plan.legend.label)}</text>`
  );
  out.push("</g>");

  out.push("</svg>");
  return out.join("\n");
}
