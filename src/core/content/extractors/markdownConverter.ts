import TurndownService from 'turndown';
import { logger } from '../../../utils/logger';
import { errorMessage } from '../../errors';
import { HEADING_TAGS } from './selectors';
import { toSingleLine } from './markup';

function isElement(node: Node): node is Element {
  return node.nodeType === 1;
}

/**
 * HTML to Markdown converter for article bodies.
 * Images stay as markdown images; tables stay as single-line HTML.
 */
export class MarkdownConverter {
  private turndownService: TurndownService;

  constructor() {
    this.turndownService = new TurndownService({
      headingStyle: 'atx',
      hr: '---',
      bulletListMarker: '-',
      codeBlockStyle: 'fenced',
      fence: '```',
      emDelimiter: '*',
      strongDelimiter: '**',
      linkStyle: 'inlined',
      linkReferenceStyle: 'full',
      preformattedCode: true,
    });

    this.configureRules();
  }

  private configureRules(): void {
    this.turndownService.addRule('headings-with-hierarchy', {
      filter: [...HEADING_TAGS],
      replacement: (content: string, node: Node) => {
        const level = isElement(node) ? parseInt(node.tagName.charAt(1), 10) : 2;
        return `\n\n${'#'.repeat(level)} ${content.trim()}\n\n`;
      },
    });

    this.turndownService.addRule('paragraphs-with-spacing', {
      filter: 'p',
      replacement: (content: string) => `\n\n${content.trim()}\n\n`,
    });

    this.turndownService.addRule('code-blocks', {
      filter: 'pre',
      replacement: (_content: string, node: Node) => {
        const code = node.textContent ?? '';
        const lang = isElement(node) ? this.detectLanguage(node) : '';
        return `\n\n\`\`\`${lang}\n${code}\n\`\`\`\n\n`;
      },
    });

    this.turndownService.addRule('blockquotes', {
      filter: 'blockquote',
      replacement: (content: string) => `\n\n> ${content.trim().replace(/\n/g, '\n> ')}\n\n`,
    });

    // Tables are kept as markup; markdown tables lose merged cells
    this.turndownService.addRule('tables-as-html', {
      filter: 'table',
      replacement: (_content: string, node: Node) =>
        isElement(node) ? `\n\n${toSingleLine(node.outerHTML)}\n\n` : '',
    });

    this.turndownService.addRule('remove-noise', {
      filter: ['script', 'style', 'nav', 'aside', 'footer', 'header', 'form', 'button'],
      replacement: () => '',
    });
  }

  private detectLanguage(codeNode: Element): string {
    const className = codeNode.className || codeNode.querySelector('code')?.className || '';
    const langMatch = className.match(/(?:language-|lang-|highlight-)([a-zA-Z0-9]+)/);
    return langMatch?.[1] ?? '';
  }

  convertToMarkdown(html: string): string {
    try {
      return this.postProcessMarkdown(this.turndownService.turndown(html)).trim();
    } catch (error) {
      logger.warn(
        { event: 'markdown_conversion_failed', error: errorMessage(error) },
        'Markdown conversion failed, falling back to plain text'
      );
      return html
        .replace(/<[^>]*>/g, ' ')
        .replace(/\s+/g, ' ')
        .trim();
    }
  }

  private postProcessMarkdown(markdown: string): string {
    return (
      markdown
        .replace(/\n{3,}/g, '\n\n')
        // Headings always start their own block
        .replace(/([^\n])\n(#{1,6} )/g, '$1\n\n$2')
        .trim()
    );
  }
}

export const markdownConverter = new MarkdownConverter();
