const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/** Inner markup of <body>, or the whole input when it is a fragment */
export function bodyContent(html: string): string {
  const open = /<body\b[^>]*>/i.exec(html);
  if (!open) return html;
  const start = open.index + open[0].length;
  const close = html.toLowerCase().lastIndexOf("</body>");
  return close >= start ? html.slice(start, close) : html.slice(start);
}

/** Plain text as markup with line breaks and runs of spaces kept */
export function plainTextToHtml(text: string): string {
  return `<pre style="white-space: pre-wrap">${escapeHtml(text.replace(/\r\n?/g, "\n"))}</pre>`;
}
