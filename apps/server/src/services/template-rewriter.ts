/**
 * Template Rewriter - Post-processes the rendered index page
 *
 * Builds a pure text transformation from an IconSet and RewriteConfig.
 * Substitutions run in a fixed order on the whole document, each on the
 * output of the previous one:
 *
 *   1. favicon      - literal `/static/icons/favicon.ico`
 *   2. apple icon   - literal `/static/icons/favicon-apple-180x180.png`
 *   3. title        - `<title>` content plus a client-side shim after `<body>`
 *   4. accent color - mask-icon `color` and the first `<path fill="...">`
 *
 * Text substitution only: the document is never parsed, so markup outside
 * the matched fragments is left byte-for-byte intact.
 *
 * The title is not spliced in raw: it is HTML-escaped inside `<title>` and
 * written as a JSON string literal in the shim. Browsers display the same
 * text, but a title holding markup cannot inject into the page.
 */

import type { IconSet, RewriteConfig } from '@branding/types';

/** Favicon URL the host renders by default */
export const HOST_FAVICON_PATH = '/static/icons/favicon.ico';

/** Apple touch icon URL the host renders by default */
export const HOST_APPLE_ICON_PATH = '/static/icons/favicon-apple-180x180.png';

/** Host display name as it appears in the page title */
export const HOST_TITLE = 'Home Assistant';

/** Title tag the host renders by default */
export const HOST_TITLE_TAG = `<title>${HOST_TITLE}</title>`;

/** Body tag the title shim is injected after */
export const BODY_TAG = '<body>';

/**
 * Color attribute of the Safari pinned-tab icon link
 *
 * Captures:
 *   [1] everything up to and including `color="`
 */
const MASK_ICON_COLOR_RE =
  /(<link rel="mask-icon" href="\/static\/icons\/mask-icon\.svg" color=")#[0-9a-fA-F]{6}(?=")/g;

/**
 * Fill of the launch screen logo; only the first match is the accent-colored shape
 */
const PATH_FILL_RE = /<path fill="#[0-9a-fA-F]{6}" /;

/** Rewrites the HTML produced by one render */
export type RenderPostProcessor = (html: string) => string;

function escapeHtml(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * JSON-encode a string for embedding in an inline script. `<` is escaped
 * so a title can never close the surrounding script element.
 */
function toScriptString(value: string): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

/**
 * Client-side snippet injected after `<body>` when a title is set.
 *
 * Renames the sidebar title once the `ha-sidebar` element is defined and
 * polls every second to replace the host name in `document.title`, which
 * the front end resets on navigation.
 */
export function buildTitleShim(title: string): string {
  const encoded = toScriptString(title);
  return `
    <script type="module">
      const brandTitle = ${encoded};
      customElements.whenDefined('ha-sidebar').then(() => {
        const Sidebar = customElements.get('ha-sidebar');
        const updated = Sidebar.prototype.updated;
        Sidebar.prototype.updated = function (changedProperties) {
          updated.bind(this)(changedProperties);
          this.shadowRoot.querySelector('.title').textContent = brandTitle;
        };
      });

      window.setInterval(() => {
        if (!document.title.endsWith('- ' + brandTitle) && document.title !== brandTitle) {
          document.title = document.title.replace(/${HOST_TITLE}/, brandTitle);
        }
      }, 1000);
    </script>
`;
}

/**
 * Create the post-processor for one activation.
 *
 * The returned function closes over copies of the inputs and keeps no
 * state between calls, so it is safe to call from concurrent requests.
 */
export function createRenderPostProcessor(
  icons: IconSet,
  config: RewriteConfig
): RenderPostProcessor {
  const favicon = icons.favicon;
  const appleIcon = icons.appleIcon;
  const title = config.title || undefined;
  const accentColor = config.accentColor || undefined;
  const titleTag = title ? `<title>${escapeHtml(title)}</title>` : undefined;
  const titleShim = title ? buildTitleShim(title) : undefined;

  return (html: string): string => {
    let text = html;

    if (favicon) {
      text = text.replaceAll(HOST_FAVICON_PATH, () => favicon);
    }

    if (appleIcon) {
      text = text.replaceAll(HOST_APPLE_ICON_PATH, () => appleIcon);
    }

    if (titleTag && titleShim) {
      text = text.replaceAll(HOST_TITLE_TAG, () => titleTag);
      text = text.replace(BODY_TAG, () => BODY_TAG + titleShim);
    }

    if (accentColor) {
      text = text.replace(MASK_ICON_COLOR_RE, (_match, prefix: string) => prefix + accentColor);
      text = text.replace(PATH_FILL_RE, () => `<path fill="${accentColor}" `);
    }

    return text;
  };
}
