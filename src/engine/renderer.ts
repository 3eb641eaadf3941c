import {readFile} from 'node:fs/promises'
import Handlebars from 'handlebars'
import {RenderError} from '../errors.js'
import type {TemplateContext} from '../types.js'

/**
 * Expands templates against a typed context.
 *
 * Uses a private Handlebars environment in strict mode: a reference to an
 * undefined variable throws instead of rendering as an empty string.
 * No partials or helpers are registered, so a template cannot pull in
 * other files. Output is not HTML-escaped (templates produce scripts and
 * build files).
 */
export class TemplateRenderer {
  private readonly handlebars = Handlebars.create()

  /**
   * @param source - Template text
   * @param context - Variables referenced by the template
   * @param name - Name used in error messages (usually the destination)
   * @throws {RenderError} On a malformed context, a syntax error or an undefined variable
   */
  render(source: string, context: unknown, name = '<template>'): string {
    const validContext = TemplateRenderer.validateContext(context, name)
    try {
      const template = this.handlebars.compile<TemplateContext>(source, {strict: true, noEscape: true})
      return template(validContext)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new RenderError(name, `Failed to render template for '${name}': ${reason}`, 'RENDER_FAILED', {cause: error})
    }
  }

  /**
   * Reads a single template file and renders it.
   */
  async renderFile(templatePath: string, context: unknown, name = templatePath): Promise<string> {
    const source = await readFile(templatePath, 'utf8')
    return this.render(source, context, name)
  }

  private static validateContext(context: unknown, name: string): TemplateContext {
    if (context === null || context === undefined) {
      throw new RenderError(name, `Template context can't be empty for '${name}'`, 'INVALID_TEMPLATE_CONTEXT')
    }

    if (!isTemplateContext(context)) {
      throw new RenderError(name, `Template context must be a mapping for '${name}'`, 'INVALID_TEMPLATE_CONTEXT')
    }

    return context
  }
}

export function isTemplateContext(value: unknown): value is TemplateContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
