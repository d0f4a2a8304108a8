import type { ItemRow, PageViewModel, SourceBlock } from './viewModel.js';

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function option(value: string, selected: boolean, label = value): string {
  const attr = selected ? ' selected' : '';
  return `<option value="${escapeHtml(value)}"${attr}>${escapeHtml(label)}</option>`;
}

function renderDeadline(row: ItemRow): string {
  if (row.daysLeft === null) return row.deadline;
  return `${escapeHtml(row.deadline)} <small>(${row.daysLeft} d)</small>`;
}

function renderRow(row: ItemRow, statusChoices: string[]): string {
  const statusStyle = row.statusBg
    ? ` style="background:${row.statusBg};color:${row.statusColor}"`
    : '';
  const href = /^https?:\/\//i.test(row.link) ? escapeHtml(row.link) : '#';
  return `
      <tr data-uid="${escapeHtml(row.uid)}">
        <td><input type="checkbox" class="seen"${row.seen ? ' checked' : ''} /></td>
        <td><a href="${href}" target="_blank" rel="noopener">${escapeHtml(row.title)}</a></td>
        <td>${renderDeadline(row)}</td>
        <td>${escapeHtml(row.agency)}</td>
        <td>${escapeHtml(row.region)}</td>
        <td><select class="status"${statusStyle}>${statusChoices
          .map((choice) => option(choice, choice === row.status))
          .join('')}</select></td>
        <td><input type="text" class="notes" value="${escapeHtml(row.notes)}" /></td>
        <td><button class="hide" title="Do not show again">✕</button></td>
      </tr>`;
}

const HEADINGS = ['Seen', 'Title', 'Deadline', 'Agency', 'Region', 'Status', 'Notes', ''];

function renderSource(block: SourceBlock, statusChoices: string[]): string {
  return `
  <section class="source">
    <h3>${escapeHtml(block.source)} <small>(${block.rows.length})</small></h3>
    <table>
      <thead><tr>${HEADINGS.map((heading) => `<th>${heading}</th>`).join('')}</tr></thead>
      <tbody>${block.rows.map((row) => renderRow(row, statusChoices)).join('')}
      </tbody>
    </table>
  </section>`;
}

function renderErrors(vm: PageViewModel): string {
  if (vm.errors.length === 0) return '';
  const items = vm.errors.map(
    (entry) => `<li><b>${escapeHtml(entry.where)}</b>: ${escapeHtml(entry.message)}</li>`,
  );
  return `<ul class="errors">${items.join('')}</ul>`;
}

// Event binding only; everything shown is rendered on the server.
const CLIENT_SCRIPT = `
async function post(url, body, signal) {
  const res = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
    signal,
  });
  return res.json();
}
function update(uid, patch) {
  return post('/api/items/update', { updates: [Object.assign({ uid }, patch)] });
}
document.querySelectorAll('tr[data-uid]').forEach((tr) => {
  const uid = tr.dataset.uid;
  const on = (selector, type, handler) =>
    tr.querySelector(selector).addEventListener(type, handler);
  on('.seen', 'change', (e) => update(uid, { seen: e.target.checked }));
  on('.status', 'change', (e) =>
    update(uid, { status: e.target.value }).then(() => location.reload()),
  );
  on('.notes', 'change', (e) => update(uid, { notes: e.target.value }));
  on('.hide', 'click', () => update(uid, { do_not_show: true }).then(() => tr.remove()));
});
document.getElementById('filters').addEventListener('change', (e) => e.currentTarget.submit());

let collecting = null;
document.getElementById('cancel-collect').addEventListener('click', () => {
  if (collecting) collecting.abort();
});
document.getElementById('collect').addEventListener('click', async (e) => {
  const button = e.target;
  const cancel = document.getElementById('cancel-collect');
  const progress = document.getElementById('progress');
  const groups = Array.from(document.getElementById('group').options, (option) => option.value);
  const minDays = parseInt(document.getElementById('min-days').value, 10);
  const totals = { new_items: 0, fixed_links: 0, errors: 0, done: 0 };

  collecting = new AbortController();
  button.disabled = true;
  cancel.hidden = false;
  // one request per group, so a cancel stops between groups
  for (const group of groups) {
    progress.textContent = (totals.done + 1) + '/' + groups.length + ' ' + group;
    try {
      const body = { groups: [group], min_days: Number.isNaN(minDays) ? null : minDays };
      const data = await post('/api/collect', body, collecting.signal);
      totals.new_items += data.result.new_items;
      totals.fixed_links += data.result.fixed_links;
      totals.errors += data.errors.length;
      totals.done += 1;
    } catch (err) {
      if (err.name !== 'AbortError') totals.errors += 1;
      break;
    }
  }
  cancel.hidden = true;
  const cancelled = collecting.signal.aborted ? ' (cancelled)' : '';
  alert(
    'Groups: ' + totals.done + '/' + groups.length + cancelled +
      ' | new items: ' + totals.new_items +
      ' | links fixed: ' + totals.fixed_links +
      ' | errors: ' + totals.errors,
  );
  location.reload();
});
document.getElementById('save-regex').addEventListener('click', async () => {
  const group = document.getElementById('group').value;
  const regex = document.getElementById('regex').value;
  const data = await post('/api/group/regex', { group, regex });
  if (data.errors.length) alert(data.errors.map((e) => e.message).join('\\n'));
});
`;

export function renderPage(vm: PageViewModel): string {
  const groupOptions = vm.groups.map((group) => option(group.label, group.selected)).join('');
  const statusOptions = vm.statusOptions
    .map((status) => option(status.value, status.selected))
    .join('');
  return `<!doctype html>
<html lang="pt-BR">
<head>
  <meta charset="utf-8" />
  <title>Editais Watcher</title>
  <style>
    body { font-family: system-ui, sans-serif; background: #0e0e10; color: #eee; margin: 1.5rem; }
    a { color: #8ab4f8; }
    table { border-collapse: collapse; width: 100%; margin-bottom: 1rem; }
    td, th {
      border-bottom: 1px solid #333; padding: .3rem .5rem; text-align: left; vertical-align: top;
    }
    .errors { color: #ef476f; }
    header form, header div { display: inline-block; margin-right: 1rem; }
  </style>
</head>
<body>
  <header>
    <h1>Editais Watcher</h1>
    <form id="filters" method="get" action="/">
      <select id="group" name="group">${groupOptions}</select>
      <select name="status">${statusOptions}</select>
    </form>
    <div>
      <label>Min. days <input id="min-days" type="number" min="0" value="${vm.minDays}" /></label>
      <button id="collect">Collect all groups</button>
      <button id="cancel-collect" hidden>Cancel</button>
      <span id="progress"></span>
    </div>
    <div>
      <label>Regex
        <input id="regex" type="text" size="60" value="${escapeHtml(vm.regex)}" />
      </label>
      <button id="save-regex">Save</button>
    </div>
  </header>
  ${renderErrors(vm)}
  <p>${vm.itemsCount} item(s) in ${escapeHtml(vm.selectedGroup)} · USD/BRL ${vm.usdBrl}</p>
  ${vm.sources.map((block) => renderSource(block, vm.statusChoices)).join('')}
  <script>${CLIENT_SCRIPT}</script>
</body>
</html>`;
}
