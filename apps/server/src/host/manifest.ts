/**
 * Manifest registry - The web app manifest served at /manifest.json
 *
 * Plugins change manifest keys through `add(key, value)`. Values are
 * deep-copied on the way in and on the way out, so callers can never
 * mutate the registry through a reference they passed or received.
 */

import type { ManifestIcon, ManifestJson } from '@branding/types';

/** Default display name of the dashboard */
export const DEFAULT_MANIFEST_NAME = 'Home Assistant';

/** Default short display name of the dashboard */
export const DEFAULT_MANIFEST_SHORT_NAME = 'Assistant';

/** Icons the host ships with */
export const DEFAULT_MANIFEST_ICONS: readonly ManifestIcon[] = [
  { src: '/static/icons/favicon-192x192.png', sizes: '192x192', type: 'image/png' },
  { src: '/static/icons/favicon-384x384.png', sizes: '384x384', type: 'image/png' },
  { src: '/static/icons/favicon-512x512.png', sizes: '512x512', type: 'image/png' },
  {
    src: '/static/icons/favicon-1024x1024.png',
    sizes: '1024x1024',
    type: 'image/png',
    purpose: 'maskable',
  },
];

export function createDefaultManifest(): ManifestJson {
  return {
    background_color: '#FFFFFF',
    description: 'Home automation platform that puts local control and privacy first.',
    dir: 'ltr',
    display: 'standalone',
    icons: DEFAULT_MANIFEST_ICONS.map((icon) => ({ ...icon })),
    lang: 'en-US',
    name: DEFAULT_MANIFEST_NAME,
    short_name: DEFAULT_MANIFEST_SHORT_NAME,
    start_url: '/?homescreen=1',
    theme_color: '#03A9F4',
  };
}

export class ManifestRegistry {
  private manifest: ManifestJson;

  constructor(initial: ManifestJson = createDefaultManifest()) {
    this.manifest = structuredClone(initial);
  }

  /**
   * Set a manifest key, replacing any previous value
   */
  add<K extends keyof ManifestJson & string>(key: K, value: ManifestJson[K]): void {
    this.manifest[key] = structuredClone(value);
  }

  get<K extends keyof ManifestJson & string>(key: K): ManifestJson[K] {
    return structuredClone(this.manifest[key]);
  }

  /** Icons currently served */
  get icons(): ManifestIcon[] {
    return this.get('icons');
  }

  toJSON(): ManifestJson {
    return structuredClone(this.manifest);
  }
}
