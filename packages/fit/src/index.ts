export * from "./types.ts";
export { decodeFit, FitDecodeError, type DecodedFit } from "./decode.ts";
export { extractRecords, recordTypes, RECORD_TYPE } from "./extract.ts";
export { csvToTable, tableToCsv, readTableCsv, writeTableCsv, metricsToCsv } from "./csv.ts";
export * from "./metrics.ts";
export * from "./aggregate.ts";
export { selectCharts, type ChartSpec, type ChartMetric, type ChartFlags } from "./charts/select.ts";
export { buildChartData, type ChartData } from "./charts/data.ts";
export { renderChartPng, renderChartSvg } from "./charts/render.tsx";
export { writeCharts, type ChartOutcome } from "./charts/write.ts";
export { formatSummary, type SummaryInput } from "./summary.ts";
export * from "./pipeline.ts";
export * from "./compare.ts";
