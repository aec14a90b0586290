// source/handler/templates.ts
// HTML template for directory listings.

import type { DirectoryListing, ListingEntry } from '../types.js';

interface ListingOptions {
  /** Normalized request path of the directory, always starting with `/`. */
  requestPath: string;
}

const encodeHTMLRules: Record<string, string> = {
  '&': '&#38;',
  '<': '&#60;',
  '>': '&#62;',
  '"': '&#34;',
  "'": '&#39;',
};

export const encodeHTML = (code: string): string =>
  code.replace(/[&<>"']/g, (m) => encodeHTMLRules[m] ?? m);

// Links are relative to the listing. Without a trailing slash the browser
// resolves them against the parent, so they have to name this directory too.
const hrefPrefix = (requestPath: string): string => {
  if (requestPath.endsWith('/')) {
    return '';
  }
  const segment = requestPath.slice(requestPath.lastIndexOf('/') + 1);
  return `${encodeURIComponent(segment)}/`;
};

const entryItem = (entry: ListingEntry, prefix: string): string => {
  const marker = entry.isDirectory ? '/' : '';
  const href = encodeHTML(`${prefix}${encodeURIComponent(entry.name)}${marker}`);
  const text = `${encodeHTML(entry.name)}${marker}`;
  const className = entry.isDirectory ? 'folder' : 'file';

  return `<li><a href="${href}" class="${className}">${text}</a></li>`;
};

export const directoryTemplate = (
  listing: DirectoryListing,
  options: ListingOptions,
): string => {
  const { entries } = listing;
  const title = `Index of ${encodeHTML(options.requestPath)}`;
  const prefix = hrefPrefix(options.requestPath);

  const content =
    entries.length === 0
      ? '<p class="empty">empty directory</p>'
      : `<ul>${entries.map((entry) => entryItem(entry, prefix)).join('')}</ul>`;

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${title}</title>
  <style>
    body { margin: 0; padding: 30px; background: #fff; font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", "Roboto", "Helvetica Neue", sans-serif; -webkit-font-smoothing: antialiased; }
    main { max-width: 920px; }
    h1 { font-size: 18px; font-weight: 500; margin-top: 0; color: #000; }
    ul { margin: 0; padding: 20px 0 0 0; }
    ul li { list-style: none; font-size: 14px; }
    a { text-decoration: none; color: #000; }
    ul a { display: block; padding: 8px 5px; white-space: nowrap; overflow: hidden; text-overflow: ellipsis; }
    ul a:hover { text-decoration: underline; }
    ul a.folder { font-weight: 500; }
    p.empty { color: #666; font-size: 14px; }
  </style>
</head>
<body>
  <main>
    <h1>${title}</h1>
    ${content}
  </main>
</body>
</html>
`;
};
