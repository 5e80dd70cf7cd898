/**
 * View/Template Layer
 *
 * Renders deferred template responses.
 */

export {
  TemplateEngine,
  TemplateSyntaxError,
  TemplateNotFoundError,
  SafeHtml,
  escapeHtml,
  raw,
  getTemplateEngine,
  setTemplateEngine,
  type TemplateOptions,
  type TemplateContext,
  type TemplateRenderer,
} from './template.ts';
