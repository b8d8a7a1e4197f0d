/**
 * Branding Hooks - Installs and removes the index page and manifest overrides
 *
 * Holds the one piece of shared mutable state: the InstalledHook record,
 * which captures the host's original template producer and manifest icons
 * at first activation. Every later activation chains from those originals,
 * so reconfiguring any number of times never loses the true original.
 *
 * Activation and removal are expected to be called serially by the
 * integration lifecycle; no locking is done here.
 */

import type { IconSet, ManifestIcon, RewriteConfig } from '@branding/types';
import { locateIcons } from '@branding/platform';
import { createLogger, HookNotInstalledError } from '@branding/utils';
import type { FrontendHost, TemplateProducer } from '../host/frontend-host.js';
import { DEFAULT_MANIFEST_NAME, DEFAULT_MANIFEST_SHORT_NAME } from '../host/manifest.js';
import { createRenderPostProcessor } from './template-rewriter.js';

const logger = createLogger('BrandingHooks');

/**
 * Originals captured at first activation, plus the override currently installed
 */
export interface InstalledHook {
  /** Host template producer before any override */
  readonly originalGetTemplate: TemplateProducer;
  /** Host manifest icons before any override */
  readonly originalManifestIcons: readonly ManifestIcon[];
  /** Producer installed by the last activation, null once removed */
  active: TemplateProducer | null;
  /** Icons discovered by the last activation */
  icons: IconSet;
}

export interface BrandingHooksOptions {
  /** Sort icon folder entries before classifying them (default: false) */
  sortIconEntries?: boolean;
}

export class BrandingHooks {
  private hook: InstalledHook | null = null;

  constructor(
    private readonly host: FrontendHost,
    private readonly options: BrandingHooksOptions = {}
  ) {}

  /**
   * Capture the host's originals if this is the first activation
   */
  captureOriginals(): InstalledHook {
    if (!this.hook) {
      this.hook = {
        originalGetTemplate: this.host.getTemplate,
        originalManifestIcons: this.host.manifest.icons,
        active: null,
        icons: {},
      };
      logger.debug('Captured original template producer and manifest icons', {
        manifestIcons: this.hook.originalManifestIcons.length,
      });
    }
    return this.hook;
  }

  /** Whether an override is currently installed */
  get isActive(): boolean {
    return Boolean(this.hook?.active);
  }

  /** Icons discovered by the last activation (empty when inactive) */
  get icons(): IconSet {
    return this.hook?.active ? this.hook.icons : {};
  }

  /**
   * Discover icons and install the overrides
   *
   * Icon discovery problems are logged and treated as "no icons"; the title
   * and accent color are still applied.
   */
  async installRewrite(config: RewriteConfig): Promise<void> {
    logger.debug('Installing rewrite', config);

    const icons = await this.host.runInExecutor(() =>
      locateIcons(config.iconFolder, {
        resolveStoragePath: this.host.resolveStoragePath,
        sortEntries: this.options.sortIconEntries,
      })
    );

    const hook = this.captureOriginals();
    const original = hook.originalGetTemplate;
    const postProcess = createRenderPostProcessor(icons, config);

    const producer: TemplateProducer = (view) => {
      const template = original(view);
      const render = template.render.bind(template);
      return {
        render: (context) => postProcess(render(context)),
      };
    };

    hook.active = producer;
    hook.icons = icons;
    this.host.getTemplate = producer;
    this.host.clearTemplateCaches();

    if (icons.manifestIcons && icons.manifestIcons.length > 0) {
      this.host.manifest.add('icons', icons.manifestIcons);
    } else {
      this.host.manifest.add('icons', [...hook.originalManifestIcons]);
    }

    if (config.title) {
      this.host.manifest.add('name', config.title);
      this.host.manifest.add('short_name', config.title);
    } else {
      this.host.manifest.add('name', DEFAULT_MANIFEST_NAME);
      this.host.manifest.add('short_name', DEFAULT_MANIFEST_SHORT_NAME);
    }

    logger.info('Branding applied', {
      title: config.title ?? null,
      accentColor: config.accentColor ?? null,
      favicon: icons.favicon ?? null,
      appleIcon: icons.appleIcon ?? null,
      manifestIcons: icons.manifestIcons?.length ?? 0,
    });
  }

  /**
   * Restore the host's original producer and manifest
   *
   * @throws HookNotInstalledError if no activation ever captured the originals
   */
  removeRewrite(): void {
    const hook = this.hook;
    if (!hook) {
      throw new HookNotInstalledError();
    }

    this.host.getTemplate = hook.originalGetTemplate;
    this.host.clearTemplateCaches();
    this.host.manifest.add('icons', [...hook.originalManifestIcons]);
    this.host.manifest.add('name', DEFAULT_MANIFEST_NAME);
    this.host.manifest.add('short_name', DEFAULT_MANIFEST_SHORT_NAME);

    hook.active = null;
    hook.icons = {};
    logger.info('Branding removed');
  }
}
