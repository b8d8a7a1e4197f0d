/**
 * Branding integration constants
 */

export const CONF_TITLE = 'title';
export const CONF_ICON_PATH = 'icon_path';
export const CONF_ICON_COLOR = 'launch_icon_color';

export const DEFAULT_TITLE = 'Home Assistant';
export const DEFAULT_ICON_PATH = '/local/favicons/';
export const DEFAULT_ICON_COLOR = '#18BCF2';

/** Title given to the created config entry */
export const ENTRY_TITLE = 'favicon';
