import { NET_PAY_THRESHOLD, PAYROLL_COLUMNS, roundTo2 } from '../services/payroll';
import { FieldIssue, PayrollLine, PayrollSummary, StaffSubmission } from '../types';

export function escapeHtml(s: unknown) {
  if (s === null || s === undefined) return '';
  return String(s)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export type PayrollPageModel = {
  lines: PayrollLine[];
  summary: PayrollSummary;
  issues?: FieldIssue[];
  submitted?: StaffSubmission;
};

const FORM_FIELDS: ReadonlyArray<{ name: keyof StaffSubmission; placeholder: string }> = [
  { name: 'name', placeholder: 'Name' },
  { name: 'role', placeholder: 'Role' },
  { name: 'basic', placeholder: 'Basic' },
  { name: 'housing', placeholder: 'Housing' },
  { name: 'transport', placeholder: 'Transport' },
  { name: 'feeding', placeholder: 'Feeding' },
];

export function formatCell(value: PayrollLine[keyof PayrollLine]) {
  if (value instanceof Date) return value.toISOString().slice(0, 19).replace('T', ' ');
  if (typeof value === 'number') return value.toLocaleString('en-US', { maximumFractionDigits: 2 });
  return value;
}

function buildTable(lines: PayrollLine[]) {
  if (lines.length === 0) return '<p class="empty">No staff yet</p>';

  const head = PAYROLL_COLUMNS.map((c) => `<th>${escapeHtml(c.header)}</th>`).join('');
  const body = lines
    .map((line) => `<tr>${PAYROLL_COLUMNS.map((c) => `<td>${escapeHtml(formatCell(line[c.key]))}</td>`).join('')}</tr>`)
    .join('\n');

  return `<table class="payroll">
      <thead><tr>${head}</tr></thead>
      <tbody>
${body}
      </tbody>
    </table>`;
}

export function buildPayrollPage(model: PayrollPageModel) {
  const { lines, summary, issues = [], submitted = {} } = model;

  const errorHtml = issues.length
    ? `<ul class="errors">${issues.map((i) => `<li>${escapeHtml(`${i.field} ${i.message}`)}</li>`).join('')}</ul>`
    : '';

  const inputs = FORM_FIELDS.map(
    (f) => `<input name="${f.name}" placeholder="${f.placeholder}" value="${escapeHtml(submitted[f.name])}" required>`
  ).join('\n      ');

  return `<!doctype html>
<html>
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width,initial-scale=1" />
  <title>Payroll System</title>
  <style>
    body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, Arial; background:#f8fafc; color:#0f172a; margin:0; padding:20px; }
    #payroll { max-width: 1080px; margin: 0 auto; background:#fff; border:1px solid #e6e9ee; border-radius:14px; padding:28px; }
    form { display:flex; flex-wrap:wrap; gap:8px; margin-bottom:16px; }
    input { padding:6px 8px; border:1px solid #e6e9ee; border-radius:6px; }
    table.payroll { width:100%; border-collapse:collapse; font-size:13px; }
    table.payroll th, table.payroll td { border-bottom:1px solid #e6e9ee; padding:6px 8px; text-align:left; }
    table.payroll th { background:#f1f5f9; color:#334155; }
    .errors { color:#dc2626; }
    .summary b { color:#065f46; }
  </style>
</head>
<body>
  <div id="payroll">
    <h2>Payroll System</h2>

    ${errorHtml}
    <form method="post" action="/">
      ${inputs}
      <button>Add Staff</button>
    </form>

    <hr>
    ${buildTable(lines)}

    <div class="summary">
      <p><b>Average Gross Pay:</b> ${roundTo2(summary.averageGross).toFixed(2)}</p>
      <p><b>Staff above ₦${NET_PAY_THRESHOLD.toLocaleString('en-US')} Net Pay:</b> ${summary.aboveThresholdCount}</p>
    </div>

    <a href="/export">Export to Excel</a>
  </div>
</body>
</html>
`;
}
