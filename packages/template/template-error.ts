export type TemplateErrorKind = 'MissingTemplateVariable' | 'TemplateSyntax' | 'InvalidTemplateValue';

/**
 * Rendering failure. Always fatal to the request that produced the template,
 * since the SQL would otherwise be incomplete.
 */
export class TemplateError extends Error {
  readonly kind: TemplateErrorKind;

  constructor(kind: TemplateErrorKind, message: string) {
    super(message);
    this.name = 'TemplateError';
    this.kind = kind;
  }
}
