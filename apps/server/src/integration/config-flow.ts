/**
 * Config flow for the branding integration
 *
 * - BrandingConfigFlow.stepUser: create the single entry
 * - BrandingOptionsFlow.stepInit: edit the entry. Submitted values replace
 *   the entry data (not its options) and the entry is reloaded.
 *
 * Both steps return a form when called without input, and re-show the form
 * with per-field errors when the input does not validate. The entry checks
 * up front only pick the form to show; the queued create or update checks
 * again, and a conflict found there ends the flow with an abort.
 */

import type { BrandingEntryData, ConfigFlowResult, FlowErrors } from '@branding/types';
import { isPublicAssetPath } from '@branding/platform';
import {
  createLogger,
  EntryStateError,
  isHexColor,
  isRgbColor,
  rgbToHex,
  ValidationError,
} from '@branding/utils';
import type { BrandingIntegration } from './lifecycle.js';
import {
  CONF_ICON_COLOR,
  CONF_ICON_PATH,
  CONF_TITLE,
  DEFAULT_ICON_COLOR,
  DEFAULT_ICON_PATH,
  DEFAULT_TITLE,
  ENTRY_TITLE,
} from './const.js';

const logger = createLogger('ConfigFlow');

/** Error codes reported per field */
export const FLOW_ERROR_REQUIRED = 'required';
export const FLOW_ERROR_INVALID_PATH = 'invalid_path';
export const FLOW_ERROR_INVALID_COLOR = 'invalid_color';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateTitle(value: unknown): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(FLOW_ERROR_REQUIRED, CONF_TITLE);
  }
  return value.trim();
}

function validateIconPath(value: unknown): string {
  if (typeof value !== 'string' || value === '') {
    throw new ValidationError(FLOW_ERROR_REQUIRED, CONF_ICON_PATH);
  }
  if (!isPublicAssetPath(value)) {
    throw new ValidationError(FLOW_ERROR_INVALID_PATH, CONF_ICON_PATH);
  }
  return value;
}

/**
 * Accepts `#RRGGBB` as typed, or an `[R, G, B]` triple from a color selector
 */
function validateIconColor(value: unknown): string {
  if (value === undefined || value === null || value === '') {
    throw new ValidationError(FLOW_ERROR_REQUIRED, CONF_ICON_COLOR);
  }
  if (isHexColor(value)) {
    return value;
  }
  if (isRgbColor(value)) {
    return rgbToHex(value);
  }
  throw new ValidationError(FLOW_ERROR_INVALID_COLOR, CONF_ICON_COLOR);
}

export interface EntryInputValidation {
  data: BrandingEntryData | null;
  errors: FlowErrors;
}

/**
 * Validate submitted form input into entry data
 */
export function validateEntryInput(input: unknown): EntryInputValidation {
  const record = isRecord(input) ? input : {};
  const errors: FlowErrors = {};

  const collect = <T>(validate: () => T): T | undefined => {
    try {
      return validate();
    } catch (error) {
      if (error instanceof ValidationError && isEntryKey(error.field)) {
        errors[error.field] = error.message;
        return undefined;
      }
      throw error;
    }
  };

  const title = collect(() => validateTitle(record[CONF_TITLE]));
  const iconPath = collect(() => validateIconPath(record[CONF_ICON_PATH]));
  const iconColor = collect(() => validateIconColor(record[CONF_ICON_COLOR]));

  if (title === undefined || iconPath === undefined || iconColor === undefined) {
    return { data: null, errors };
  }
  return {
    data: { title, icon_path: iconPath, launch_icon_color: iconColor },
    errors,
  };
}

function isEntryKey(field: string): field is keyof BrandingEntryData {
  return field === CONF_TITLE || field === CONF_ICON_PATH || field === CONF_ICON_COLOR;
}

/**
 * Form defaults: submitted values first, then the fallback dict
 */
export function getFormDefaults(
  input: unknown,
  fallback: BrandingEntryData
): BrandingEntryData {
  const record = isRecord(input) ? input : {};
  const pick = (key: keyof BrandingEntryData): string => {
    const value = record[key];
    if (typeof value === 'string' && value !== '') return value;
    if (key === CONF_ICON_COLOR && isRgbColor(value)) return rgbToHex(value);
    return fallback[key];
  };
  return {
    title: pick(CONF_TITLE),
    icon_path: pick(CONF_ICON_PATH),
    launch_icon_color: pick(CONF_ICON_COLOR),
  };
}

/** Defaults offered when creating the entry */
export const INPUT_DEFAULTS: BrandingEntryData = {
  title: DEFAULT_TITLE,
  icon_path: DEFAULT_ICON_PATH,
  launch_icon_color: DEFAULT_ICON_COLOR,
};

/**
 * Run a lifecycle step, turning an entry state conflict into an abort
 */
async function abortOnConflict(
  step: () => Promise<ConfigFlowResult>
): Promise<ConfigFlowResult> {
  try {
    return await step();
  } catch (error) {
    if (error instanceof EntryStateError) {
      logger.warn('Aborting flow:', error.message);
      return { type: 'abort', reason: error.reason };
    }
    throw error;
  }
}

export class BrandingConfigFlow {
  constructor(private readonly integration: BrandingIntegration) {}

  /**
   * Handle the initial step
   */
  async stepUser(userInput?: unknown): Promise<ConfigFlowResult> {
    if (this.integration.getEntry()) {
      return { type: 'abort', reason: 'single_instance_allowed' };
    }

    if (userInput === undefined) {
      return { type: 'form', stepId: 'user', defaults: { ...INPUT_DEFAULTS }, errors: {} };
    }

    logger.debug('[stepUser] user_input:', userInput);
    const { data, errors } = validateEntryInput(userInput);
    if (!data) {
      return {
        type: 'form',
        stepId: 'user',
        defaults: getFormDefaults(userInput, INPUT_DEFAULTS),
        errors,
      };
    }

    return abortOnConflict(async () => {
      await this.integration.createEntry(data);
      return { type: 'create_entry', title: ENTRY_TITLE, data };
    });
  }
}

export class BrandingOptionsFlow {
  constructor(private readonly integration: BrandingIntegration) {}

  /**
   * Manage the options. Updates the entry data rather than its options.
   */
  async stepInit(userInput?: unknown): Promise<ConfigFlowResult> {
    const entry = this.integration.getEntry();
    if (!entry) {
      return { type: 'abort', reason: 'no_entry' };
    }

    if (userInput === undefined) {
      return { type: 'form', stepId: 'init', defaults: { ...entry.data }, errors: {} };
    }

    logger.debug('[stepInit] user_input:', userInput);
    const { data, errors } = validateEntryInput(userInput);
    if (!data) {
      return {
        type: 'form',
        stepId: 'init',
        defaults: getFormDefaults(userInput, entry.data),
        errors,
      };
    }

    return abortOnConflict(async () => {
      await this.integration.updateEntry(data);
      return { type: 'create_entry', title: '', data: {} };
    });
  }
}
