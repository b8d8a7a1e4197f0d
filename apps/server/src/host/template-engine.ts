/**
 * Minimal placeholder template engine for the index page
 *
 * Replaces `{{ key }}` placeholders with values from the render context.
 * Unknown keys render as empty strings. No escaping is applied: context
 * values are trusted host data.
 */

/** Values available to `{{ key }}` placeholders */
export type TemplateContext = Record<string, string>;

/**
 * A compiled template. `render` is the host's rendering method; plugins may
 * wrap it to post-process the produced HTML.
 */
export interface IndexTemplate {
  render(context: TemplateContext): string;
}

const PLACEHOLDER_RE = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

export function compileTemplate(source: string): IndexTemplate {
  return {
    render(context: TemplateContext): string {
      return source.replace(PLACEHOLDER_RE, (_match, key: string) => context[key] ?? '');
    },
  };
}
