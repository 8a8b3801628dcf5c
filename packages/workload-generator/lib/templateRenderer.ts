import Mustache, { type RenderOptions } from 'mustache'

// {{name}}, {{{name}}} and {{&name}} variable tags, with mustache's default delimiters
const VARIABLE_TAG_PATTERN = /\{\{\{?\s*&?\s*([\w.]+)\s*\}?\}\}/g

export type TemplateContext = Record<string, string | number | boolean>

const renderOptions: RenderOptions = {
  // rendered files are property files, not HTML
  escape: (value: string) => String(value),
}

export function renderTemplate(template: string, context: TemplateContext): string {
  // no prototype, so tags like {{constructor}} stay empty instead of resolving on Object
  const view: TemplateContext = Object.assign(Object.create(null), context)
  return Mustache.render(template, view, {}, renderOptions)
}

/**
 * Lists variable tags of the template that the context has no value for.
 * Mustache renders those as empty text.
 */
export function findUnresolvedPlaceholders(template: string, context: TemplateContext): string[] {
  const unresolved = new Set<string>()
  for (const match of template.matchAll(VARIABLE_TAG_PATTERN)) {
    const name = match[1]
    if (name !== undefined && !Object.hasOwn(context, name)) {
      unresolved.add(name)
    }
  }

  return [...unresolved]
}
