/**
 * Campaign Email Templates
 *
 * Loads the campaign HTML variants from files and renders them.
 * Templates use Mustache-style {{{VARIABLE}}} placeholders for variable substitution.
 *
 * The campaign body is admin-authored HTML and is injected verbatim; it is
 * not escaped or sanitised.
 *
 * @module templates/emails
 */

import * as fs from 'fs';
import * as path from 'path';

// ========================================
// TEMPLATE TYPES
// ========================================

export const CAMPAIGN_TEMPLATE_VARIANTS = ['default', 'promotional', 'newsletter'] as const;

export type CampaignTemplateVariant = typeof CAMPAIGN_TEMPLATE_VARIANTS[number];

export interface TemplateVariables {
  [key: string]: string | number | undefined;
}

export interface RenderCampaignOptions {
  brandName?: string;
}

export const DEFAULT_BRAND_NAME = 'InsurancePro';

// ========================================
// TEMPLATE CACHE
// ========================================

// Cache loaded templates to avoid repeated file reads
const templateCache = new Map<CampaignTemplateVariant, string>();

function getTemplatePath(variant: CampaignTemplateVariant): string {
  return path.join(__dirname, 'campaign', `${variant}.html`);
}

export function isCampaignTemplateVariant(value: string): value is CampaignTemplateVariant {
  return CAMPAIGN_TEMPLATE_VARIANTS.some((variant) => variant === value);
}

/**
 * Unknown variants fall back to "default".
 */
export function resolveCampaignVariant(variant: string): CampaignTemplateVariant {
  return isCampaignTemplateVariant(variant) ? variant : 'default';
}

/**
 * Load a campaign template from file
 */
export function loadTemplate(variant: CampaignTemplateVariant): string {
  const cached = templateCache.get(variant);
  if (cached !== undefined) {
    return cached;
  }

  const templatePath = getTemplatePath(variant);
  if (!fs.existsSync(templatePath)) {
    throw new Error(`Email template not found: campaign/${variant}.html`);
  }

  const content = fs.readFileSync(templatePath, 'utf-8');
  templateCache.set(variant, content);

  return content;
}

/**
 * Render a template with variables
 * Replaces {{{VARIABLE_NAME}}} with corresponding values in one pass, so
 * placeholder-looking text inside a substituted value is left alone.
 * Unknown placeholders are kept as they are.
 */
export function renderTemplate(
  template: string,
  variables: TemplateVariables
): string {
  return template.replace(/\{\{\{([A-Z0-9_]+)\}\}\}/g, (placeholder: string, key: string) => {
    const value = variables[key];
    return value === undefined ? placeholder : String(value);
  });
}

/**
 * Render a complete campaign email.
 *
 * @param variant - Template variant; anything unrecognised renders as "default"
 * @param bodyContent - Trusted HTML placed in the content slot as-is
 * @param unsubscribeLink - Placed verbatim in the footer's unsubscribe anchor
 */
export function renderCampaignEmail(
  variant: string,
  bodyContent: string,
  unsubscribeLink: string,
  options: RenderCampaignOptions = {}
): string {
  const template = loadTemplate(resolveCampaignVariant(variant));
  return renderTemplate(template, {
    BRAND_NAME: options.brandName ?? DEFAULT_BRAND_NAME,
    CONTENT: bodyContent,
    UNSUBSCRIBE_URL: unsubscribeLink,
  });
}

export function buildUnsubscribeUrl(publicBaseUrl: string, token: string): string {
  return `${publicBaseUrl.replace(/\/+$/, '')}/unsubscribe/${token}`;
}

/**
 * Clear the template cache
 * Useful for development/testing
 */
export function clearTemplateCache(): void {
  templateCache.clear();
}
