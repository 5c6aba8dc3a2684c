import type { AppConfig } from '../config/types.js';
import type { OwnerScopeSummary, Recommendation, StateMap } from '../domain/types.js';

export interface ReportInput {
  config: AppConfig;
  recommendations: readonly Recommendation[];
  summary: readonly OwnerScopeSummary[];
  totalMonthlySavings: number;
  generatedAt: Date;
}

const usd = (value: number): string => (Number.isFinite(value) ? `$${value.toFixed(2)}` : 'N/A');

export const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');

const formatState = (state: StateMap): string =>
  Object.entries(state)
    .map(([key, value]) =>
      escapeHtml(`${key}: ${typeof value === 'number' && !Number.isInteger(value) ? value.toFixed(4) : value}`),
    )
    .join('<br/>');

export const renderHtmlReport = (input: ReportInput): string => {
  const summaryRows = input.summary
    .map(
      (row) => `<tr>
<td>${escapeHtml(row.ownerScope)}</td>
<td>${row.recommendationCount}</td>
<td>${row.rightsizeCount}</td>
<td>${row.stopIdleCount}</td>
<td>${row.reservedCapacityCount}</td>
<td>${usd(row.totalMonthlySavings)}</td>
</tr>`,
    )
    .join('\n');

  const detailRows = input.recommendations
    .map(
      (row) => `<tr data-type="${row.recommendationType}" data-confidence="${row.confidence}">
<td>${usd(row.estimatedMonthlySavings)}</td>
<td>${row.recommendationType}</td>
<td>${row.confidence}</td>
<td>${escapeHtml(row.resourceName)}</td>
<td>${escapeHtml(row.ownerScope)}</td>
<td>${escapeHtml(row.resourceGroupOrAccount)}</td>
<td>${escapeHtml(row.region)}</td>
<td>${formatState(row.currentState)}</td>
<td>${formatState(row.recommendedState)}</td>
<td class="details">${escapeHtml(row.details)}</td>
</tr>`,
    )
    .join('\n');

  return `<!doctype html>
<html lang="en">
<head>
<meta charset="UTF-8" />
<meta name="viewport" content="width=device-width, initial-scale=1.0" />
<title>Cloud Cost Optimization Report</title>
<style>
:root{--bg:#f5f7fb;--card:#fff;--line:#d7dfeb;--text:#12243b;--muted:#4b607b;--accent:#0d6efd}
*{box-sizing:border-box}body{margin:0;background:var(--bg);font-family:system-ui,-apple-system,Segoe UI,sans-serif;color:var(--text)}
main{max-width:1300px;margin:24px auto;padding:0 16px}.card{background:var(--card);border:1px solid var(--line);border-radius:12px;padding:16px;margin-bottom:14px}
h1,h2{margin:0 0 10px 0}.meta{color:var(--muted);font-size:.9rem;display:grid;gap:3px}.total{font-size:1.4rem;color:var(--accent)}
table{width:100%;border-collapse:collapse;font-size:.88rem}th,td{padding:8px;border-bottom:1px solid var(--line);white-space:nowrap;text-align:left;vertical-align:top}
td.details{white-space:normal;min-width:320px}th{background:#eff4fd;position:sticky;top:0}.table-wrap{overflow:auto;border:1px solid var(--line);border-radius:10px}
</style>
</head>
<body>
<main>
<section class="card">
<h1>Cloud Cost Optimization Report</h1>
<div class="total">Estimated monthly savings: ${usd(input.totalMonthlySavings)}</div>
<div class="meta">
<div>Generated at (UTC): ${input.generatedAt.toISOString()}</div>
<div>Lookback window: ${input.config.lookbackDays} days | Underutilization threshold: ${input.config.minCpuUtilization}% | Minimum uptime: ${input.config.minUptimeHours}h</div>
<div>Recommendations: ${input.recommendations.length}</div>
</div>
</section>
<section class="card">
<h2>By owner scope</h2>
<div class="table-wrap">
<table>
<thead><tr><th>Owner scope</th><th>Recommendations</th><th>Rightsize</th><th>Stop idle</th><th>Reserved capacity</th><th>Monthly savings</th></tr></thead>
<tbody>
${summaryRows}
</tbody>
</table>
</div>
</section>
<section class="card">
<h2>Recommendations</h2>
<div class="table-wrap">
<table>
<thead><tr><th>Monthly savings</th><th>Type</th><th>Confidence</th><th>Resource</th><th>Owner scope</th><th>Group / account</th><th>Region</th><th>Current</th><th>Recommended</th><th>Details</th></tr></thead>
<tbody>
${detailRows}
</tbody>
</table>
</div>
</section>
</main>
</body>
</html>
`;
};
