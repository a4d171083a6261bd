const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string | number): string {
  return String(value).replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export type NoticeLevel = 'success' | 'info' | 'warning' | 'danger';

export interface Notice {
  level: NoticeLevel;
  message: string;
}

export interface LayoutOptions {
  title: string;
  username?: string;
  notice?: Notice;
}

function renderNav(username: string | undefined): string {
  if (!username) {
    return '';
  }
  return `<nav>
  <a href="/">Dashboard</a>
  <a href="/transactions">Transactions</a>
  <a href="/add">Add transaction</a>
  <a href="/download/csv">Export CSV</a>
  <span class="user">${escapeHtml(username)}</span>
  <a href="/logout">Log out</a>
</nav>`;
}

export function renderNotice(notice: Notice | undefined): string {
  if (!notice) {
    return '';
  }
  return `<p class="notice notice-${notice.level}" role="alert">${escapeHtml(notice.message)}</p>`;
}

/**
 * Page shell. `body` must already be escaped.
 */
export function layout(options: LayoutOptions, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(options.title)} · Finance Tracker</title>
</head>
<body>
${renderNav(options.username)}
<main>
<h1>${escapeHtml(options.title)}</h1>
${renderNotice(options.notice)}
${body}
</main>
</body>
</html>
`;
}
