import TurndownService from 'turndown';

/**
 * Create a TurndownService configured for documentation pages.
 *
 * Configuration:
 * - ATX-style headings (`#`, `##`, etc.)
 * - `-` bullet list markers
 * - Fenced code blocks; a `language-*` class on `<code>` becomes the fence info
 * - Tables rendered as GFM pipe tables, the first row used as header
 * - Elements marked as frame errors are dropped
 */
export function createTurndownService(): TurndownService {
  const turndown = new TurndownService({
    headingStyle: 'atx',
    bulletListMarker: '-',
    codeBlockStyle: 'fenced',
    fence: '```',
    strongDelimiter: '**',
    emDelimiter: '_',
  });

  turndown.remove(['script', 'style', 'noscript', 'template']);

  turndown.addRule('table', {
    filter: 'table',
    replacement(_content, node) {
      const rows = Array.from(node.querySelectorAll('tr')).map((row) =>
        Array.from(row.querySelectorAll('th, td')).map((cell) =>
          tableCell(cell.textContent ?? ''),
        ),
      );
      return renderTable(rows);
    },
  });

  turndown.addRule('frameError', {
    filter: (node) => node.hasAttribute('data-frame-error'),
    replacement: () => '',
  });

  return turndown;
}

function tableCell(text: string): string {
  return text.replace(/\s+/g, ' ').trim().replace(/\|/g, '\\|');
}

/**
 * Render rows of cell text as a GFM table.
 */
export function renderTable(rows: string[][]): string {
  const nonEmpty = rows.filter((row) => row.length > 0);
  if (nonEmpty.length === 0) {
    return '';
  }
  const width = Math.max(...nonEmpty.map((row) => row.length));
  const line = (cells: string[]) => {
    const padded = [...cells, ...Array<string>(width - cells.length).fill('')];
    return `| ${padded.join(' | ')} |`;
  };

  const [header, ...body] = nonEmpty;
  const lines = [
    line(header),
    line(Array<string>(width).fill('---')),
    ...body.map(line),
  ];
  return `\n\n${lines.join('\n')}\n\n`;
}

const shared = createTurndownService();

/**
 * Convert an HTML fragment to markdown.
 */
export function htmlToMarkdown(html: string): string {
  if (!html || html.trim().length === 0) {
    return '';
  }
  return shared.turndown(html).trim();
}
