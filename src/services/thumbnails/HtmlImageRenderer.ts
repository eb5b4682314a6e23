import { HtmlAttributes } from '../../models/thumbnail';
import { escapeHtml } from '../../utils/html';

export interface MarkupRenderer {
  image(url: string, attributes: HtmlAttributes): string;
}

/**
 * Renders `<img>` elements. `src` comes first, `alt` defaults to an empty
 * string; `true` renders a bare attribute, `false` and `null` are left out.
 */
export class HtmlImageRenderer implements MarkupRenderer {
  image(url: string, attributes: HtmlAttributes = {}): string {
    const { alt = '', ...rest } = attributes;
    const parts = [`src="${escapeHtml(url)}"`];

    for (const [name, value] of Object.entries({ alt, ...rest })) {
      if (name === 'src' || value === undefined || value === null || value === false) {
        continue;
      }
      parts.push(value === true ? escapeHtml(name) : `${escapeHtml(name)}="${escapeHtml(String(value))}"`);
    }

    return `<img ${parts.join(' ')}/>`;
  }
}
