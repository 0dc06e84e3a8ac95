import { Resvg } from "@resvg/resvg-js";
import { renderToStaticMarkup } from "react-dom/server";
import {
  Bar,
  BarChart,
  CartesianGrid,
  Customized,
  Line,
  LineChart,
  ReferenceLine,
  Scatter,
  ScatterChart,
  XAxis,
  YAxis,
} from "recharts";
import type { ChartData } from "./data.ts";

export const CHART_WIDTH = 1000;
export const CHART_HEIGHT = 600;

const GRID = "#e0e0e0";
const INK = "#424242";
const MARGIN = { top: 50, right: 40, bottom: 40, left: 30 };

function ChartTitle({ text }: { text: string }) {
  return (
    <text x={CHART_WIDTH / 2} y={28} textAnchor="middle" fontSize={20} fontWeight="bold" fill={INK}>
      {text}
    </text>
  );
}

function axes(data: ChartData) {
  const numericX = data.kind === "scatter" || data.xKey === "minutes";
  return [
    <CartesianGrid key="grid" strokeDasharray="3 3" stroke={GRID} />,
    <XAxis
      key="x"
      dataKey={data.xKey}
      type={numericX ? "number" : "category"}
      domain={numericX ? ["dataMin", "dataMax"] : undefined}
      tick={{ fill: INK, fontSize: 12 }}
      tickFormatter={numericX ? (v: number) => (Number.isInteger(v) ? String(v) : v.toFixed(1)) : undefined}
      label={{ value: data.xLabel, position: "insideBottom", offset: -10, fill: INK }}
    />,
    <YAxis
      key="y"
      yAxisId="left"
      type="number"
      dataKey={data.kind === "scatter" ? data.series[0]?.key : undefined}
      reversed={data.invertY}
      domain={["auto", "auto"]}
      tick={{ fill: INK, fontSize: 12 }}
      tickFormatter={data.formatY}
      label={{ value: data.yLabel, angle: -90, position: "insideLeft", fill: INK }}
    />,
    data.yRightLabel === undefined ? null : (
      <YAxis
        key="y-right"
        yAxisId="right"
        orientation="right"
        type="number"
        domain={["auto", "auto"]}
        tick={{ fill: INK, fontSize: 12 }}
        label={{ value: data.yRightLabel, angle: 90, position: "insideRight", fill: INK }}
      />
    ),
    data.reference === undefined ? null : (
      <ReferenceLine
        key="ref"
        yAxisId="left"
        y={data.reference.value}
        stroke="#c62828"
        strokeDasharray="6 4"
        label={{ value: data.reference.label, position: "insideTopRight", fill: "#c62828" }}
      />
    ),
    <Customized key="title" component={<ChartTitle text={data.title} />} />,
  ];
}

function ChartElement({ data }: { data: ChartData }) {
  const size = { width: CHART_WIDTH, height: CHART_HEIGHT, margin: MARGIN };
  switch (data.kind) {
    case "line":
      return (
        <LineChart {...size} data={data.rows}>
          {axes(data)}
          {data.series.map((s) => (
            <Line
              key={s.key}
              yAxisId={s.axis ?? "left"}
              type="monotone"
              dataKey={s.key}
              name={s.label}
              stroke={s.color}
              strokeWidth={2}
              dot={data.rows.length <= 50}
              connectNulls
              isAnimationActive={false}
            />
          ))}
        </LineChart>
      );
    case "bar":
      return (
        <BarChart {...size} data={data.rows}>
          {axes(data)}
          {data.series.map((s) => (
            <Bar key={s.key} yAxisId="left" dataKey={s.key} name={s.label} fill={s.color} isAnimationActive={false} />
          ))}
        </BarChart>
      );
    case "scatter":
      return (
        <ScatterChart {...size}>
          {axes(data)}
          {data.series.map((s) => (
            <Scatter key={s.key} yAxisId="left" data={data.rows} name={s.label} fill={s.color} isAnimationActive={false} />
          ))}
        </ScatterChart>
      );
  }
}

/**
 * The bare `<svg>` element out of server-rendered chart markup (recharts
 * wraps it in a div), with the namespace a standalone file needs.
 */
export function toStandaloneSvg(markup: string): string {
  const start = markup.indexOf("<svg");
  const end = markup.lastIndexOf("</svg>");
  if (start < 0 || end < start) throw new Error("Chart rendered no SVG");
  let svg = markup.slice(start, end + "</svg>".length);
  if (!/^<svg[^>]*\sxmlns=/.test(svg)) {
    svg = svg.replace("<svg", '<svg xmlns="http://www.w3.org/2000/svg"');
  }
  return svg;
}

export function renderChartSvg(data: ChartData): string {
  if (data.rows.length === 0) throw new Error(`No data points for "${data.title}"`);
  return toStandaloneSvg(renderToStaticMarkup(<ChartElement data={data} />));
}

export function renderChartPng(data: ChartData): Buffer {
  const resvg = new Resvg(renderChartSvg(data), {
    background: "white",
    fitTo: { mode: "width", value: CHART_WIDTH },
    font: { loadSystemFonts: true },
  });
  return resvg.render().asPng();
}
