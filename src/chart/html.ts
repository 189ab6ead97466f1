import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Figure } from './figure.js';

export const PLOTLY_CDN_URL = 'https://cdn.plot.ly/plotly-2.35.2.min.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/**
 * JSON safe to inline in a <script> element: no task text can close the
 * element or open a comment.
 */
export function scriptSafeJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/>/g, '\\u003e')
    .replace(/&/g, '\\u0026')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

/** Standalone page that loads Plotly from its CDN and draws the figure. */
export function renderHtml(figure: Figure): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8" />
<title>${escapeHtml(figure.layout.title.text)}</title>
<script src="${PLOTLY_CDN_URL}" charset="utf-8"></script>
</head>
<body>
<div id="gantt" style="width:100%;"></div>
<script>
const figure = ${scriptSafeJson(figure)};
Plotly.newPlot('gantt', figure.data, figure.layout, { responsive: true });
</script>
</body>
</html>
`;
}

export async function writeChart(path: string, html: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, html, 'utf-8');
}
