export { assignBucketColors, bucketLabel, NO_BUCKET_LABEL, QUALITATIVE_PALETTE } from './palette.js';
export { disambiguateLabels, prepareChartRows, toChartRow, UNTITLED_LABEL } from './prepare.js';
export { buildFigure, buildTraces, chartHeight, HOVER_TEMPLATE } from './figure.js';
export type { BarTrace, Figure, FigureLayout, FigureOptions } from './figure.js';
export { escapeHtml, renderHtml, scriptSafeJson, writeChart, PLOTLY_CDN_URL } from './html.js';
