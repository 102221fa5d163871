import { RenderablePage } from '../interfaces/page.interface';

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

export function renderHomePage(): string {
    return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>Page Archiver</title>
</head>
<body>
  <h1>Archive a web page</h1>
  <form action="/scrape" method="post">
    <label for="url">URL</label>
    <input type="url" id="url" name="url" placeholder="https://example.com" required>
    <button type="submit">Scrape</button>
  </form>
</body>
</html>
`;
}

/**
 * Wraps a stored page with its archived assets. The stored HTML is emitted as
 * it was saved, references to the original hosts included.
 */
export function renderStoredPage(page: RenderablePage): string {
    const stylesheets = page.cssPaths
        .map((path) => `  <link rel="stylesheet" href="${escapeHtml(path)}">`)
        .join('\n');
    const scripts = page.jsPaths
        .map((path) => `  <script src="${escapeHtml(path)}"></script>`)
        .join('\n');

    return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
${stylesheets}
</head>
<body>
${page.html}
${scripts}
</body>
</html>
`;
}
