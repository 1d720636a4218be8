/**
 * Markdown Extractor
 *
 * Uses the marked lexer to turn Markdown into plain prose:
 * - headings, paragraphs, list items and table cells keep their inline text
 *   with emphasis, links and code spans unwrapped
 * - fenced code blocks keep their contents
 * - raw HTML blocks go through the HTML stripper
 *
 * The first level-1 heading becomes the document title.
 */

import { marked, type Token, type Tokens } from 'marked';

import { decodeEntities, stripHtml } from './html-extractor.js';

function childTokens(token: Token): Token[] | undefined {
  return 'tokens' in token && Array.isArray(token.tokens) ? token.tokens : undefined;
}

function ownText(token: Token): string {
  return 'text' in token && typeof token.text === 'string' ? token.text : '';
}

/**
 * Flatten inline tokens (emphasis, links, code spans) into text.
 */
function inlineText(tokens: Token[]): string {
  let out = '';
  for (const token of tokens) {
    if (token.type === 'br') {
      out += '\n';
      continue;
    }
    if (token.type === 'html') {
      out += stripHtml(token.raw);
      continue;
    }
    const children = childTokens(token);
    out += children ? inlineText(children) : ownText(token);
  }
  return out;
}

function tableRows(header: Tokens.TableCell[], rows: Tokens.TableCell[][]): string[] {
  const row = (cells: Tokens.TableCell[]): string =>
    cells.map((cell) => inlineText(cell.tokens)).join(' | ');
  return [row(header), ...rows.map(row)];
}

/**
 * Flatten block tokens into one string per block.
 */
function blockText(tokens: Token[]): string[] {
  const blocks: string[] = [];

  for (const token of tokens) {
    switch (token.type) {
      case 'space':
      case 'hr':
      case 'def':
        break;

      case 'code':
        blocks.push(ownText(token));
        break;

      case 'html':
        blocks.push(stripHtml(token.raw));
        break;

      case 'list':
        for (const item of token.items) {
          blocks.push(blockText(childTokens(item) ?? []).join(' '));
        }
        break;

      case 'table':
        blocks.push(...tableRows(token.header, token.rows));
        break;

      case 'blockquote':
        blocks.push(blockText(childTokens(token) ?? []).join('\n'));
        break;

      default: {
        // heading, paragraph, text
        const children = childTokens(token);
        blocks.push(children ? inlineText(children) : ownText(token));
      }
    }
  }

  return blocks;
}

/**
 * Extract plain text and an optional title from Markdown source.
 */
export function extractMarkdownText(content: string): { text: string; title?: string } {
  const tokens = marked.lexer(content);

  let title: string | undefined;
  const firstH1 = tokens.find((token) => token.type === 'heading' && token.depth === 1);
  if (firstH1) {
    title = decodeEntities(inlineText(childTokens(firstH1) ?? [])).trim() || undefined;
  }

  const text = decodeEntities(blockText(tokens).join('\n\n'));
  return { text, title };
}
