import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { basename, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import Handlebars, { type TemplateDelegate } from 'handlebars';
import { ok, err, type Result } from 'neverthrow';
import { TEMPLATE_NAMES, describeError } from '../../application/index.js';
import type { RenderContext, RenderError, TemplateName, TemplateRenderer } from '../../application/index.js';

/**
 * Finds `templates/email`, both from the sources (src/infrastructure/email)
 * and from the build output (dist/infrastructure/email).
 */
export function resolveTemplatesDir(): string {
  const candidates = [
    fileURLToPath(new URL('../../../templates/email', import.meta.url)),
    resolve(process.cwd(), 'templates', 'email'),
  ];

  for (const dir of candidates) {
    if (existsSync(dir)) return dir;
  }

  // Last resort: the first candidate; loading a template reports the miss
  return candidates[0] ?? resolve('templates', 'email');
}

function isTemplateName(name: string): name is TemplateName {
  return (TEMPLATE_NAMES as readonly string[]).includes(name);
}

/**
 * Renders `<templatesDir>/<name>.hbs` with Handlebars.
 *
 * Templates compile in strict mode: a key the template references but the
 * context lacks is a render error, not an empty string. Compiled templates
 * are cached per renderer.
 */
export class HandlebarsTemplateRenderer implements TemplateRenderer {
  private readonly hbs = Handlebars.create();
  private readonly cache = new Map<TemplateName, TemplateDelegate<RenderContext>>();

  constructor(private readonly templatesDir: string = resolveTemplatesDir()) {
    this.registerPartials();
  }

  render(templateName: string, context: RenderContext): Result<string, RenderError> {
    if (!isTemplateName(templateName)) {
      return err({ type: 'TEMPLATE_NOT_FOUND', templateName, message: `Unknown email template: ${templateName}` });
    }

    let template: TemplateDelegate<RenderContext>;
    try {
      template = this.load(templateName);
    } catch (error: unknown) {
      return err({ type: 'TEMPLATE_NOT_FOUND', templateName, message: describeError(error) });
    }

    try {
      return ok(template({ ...context, year: String(new Date().getUTCFullYear()) }));
    } catch (error: unknown) {
      return err({ type: 'RENDER_FAILED', templateName, message: describeError(error) });
    }
  }

  private load(name: TemplateName): TemplateDelegate<RenderContext> {
    const cached = this.cache.get(name);
    if (cached !== undefined) return cached;

    const filePath = join(this.templatesDir, `${name}.hbs`);
    if (!existsSync(filePath)) {
      throw new Error(`Email template not found: ${filePath}`);
    }

    const template = this.hbs.compile<RenderContext>(readFileSync(filePath, 'utf8'), { strict: true });
    this.cache.set(name, template);
    return template;
  }

  private registerPartials(): void {
    const partialsDir = join(this.templatesDir, 'partials');
    if (!existsSync(partialsDir)) return;

    for (const file of readdirSync(partialsDir).filter((f) => f.endsWith('.hbs'))) {
      this.hbs.registerPartial(basename(file, '.hbs'), readFileSync(join(partialsDir, file), 'utf8'));
    }
  }
}
