/**
 * Template Tests
 */

import { describe, it, expect } from 'vitest';
import {
  BUILTIN_MACROS,
  TemplateError,
  experimentScope,
  lastEnrollmentDate,
  macroTable,
  parseTemplate,
  queryScope,
  renderParameterValue,
  renderTemplate,
  resolveExperiment,
} from '../packages/template/index.js';

function renderError(source: string): TemplateError {
  try {
    renderTemplate(source, { experiment: { slug: 'onboarding-test' } });
  } catch (error) {
    if (error instanceof TemplateError) return error;
    throw error;
  }
  throw new Error(`expected '${source}' to fail`);
}

describe('Template Parser', () => {
  it('splits text and outputs', () => {
    const doc = parseTemplate('SELECT {{ experiment.slug }} AS slug');

    expect(doc.parts).toEqual([
      { type: 'text', value: 'SELECT ' },
      { type: 'output', expression: { type: 'variable', path: ['experiment', 'slug'] }, line: 1, column: 8 },
      { type: 'text', value: ' AS slug' },
    ]);
  });

  it('parses macro calls with literal arguments', () => {
    const doc = parseTemplate('{{agg_sum("active_hours_sum")}}');

    expect(doc.parts).toEqual([
      {
        type: 'output',
        expression: { type: 'call', name: 'agg_sum', args: [{ type: 'literal', value: 'active_hours_sum' }] },
        line: 1,
        column: 1,
      },
    ]);
  });

  it('parses numbers and quoted strings', () => {
    const doc = parseTemplate(`{{ 7 }}{{ 'a\\'b' }}{{ """x "y" z""" }}`);

    expect(doc.parts.map(part => (part.type === 'output' ? part.expression : part))).toEqual([
      { type: 'literal', value: 7 },
      { type: 'literal', value: "a'b" },
      { type: 'literal', value: 'x "y" z' },
    ]);
  });

  it('keeps single braces as text', () => {
    const doc = parseTemplate("STRUCT('a' AS k) {not a template}");

    expect(doc.parts).toEqual([{ type: 'text', value: "STRUCT('a' AS k) {not a template}" }]);
  });

  it('tracks lines across multi-line text', () => {
    const doc = parseTemplate('SELECT\n  x\nWHERE d = {{ experiment.slug }}');
    const output = doc.parts[1];

    expect(output).toMatchObject({ type: 'output', line: 3, column: 11 });
  });

  describe('syntax errors', () => {
    it('rejects statement blocks', () => {
      expect(() => parseTemplate('{% if x %}y{% endif %}')).toThrow(
        "Template syntax error at line 1, column 1: unsupported block '{%'"
      );
    });

    it('rejects comment blocks', () => {
      expect(() => parseTemplate('x {# note #}')).toThrow("unsupported block '{#'");
    });

    it('reports an unclosed output at the end of the template', () => {
      let caught: unknown;
      try {
        parseTemplate('SELECT {{ experiment.slug');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(TemplateError);
      expect(caught).toMatchObject({ kind: 'TemplateSyntax' });
      expect(caught instanceof Error ? caught.message : '').toMatch(/^Template syntax error at end of template: /);
    });

    it('reports an unexpected character inside an output', () => {
      expect(() => parseTemplate('{{ a + b }}')).toThrow(/^Template syntax error at line 1, column 6: /);
    });
  });
});

describe('Template Renderer', () => {
  const scope = {
    experiment: { slug: 'onboarding-test', enrollment_period: 7 },
    parameters: { min_days: '3' },
  };

  it('returns text without templates unchanged', () => {
    expect(renderTemplate('COUNT(submission_date)', scope)).toBe('COUNT(submission_date)');
  });

  it('substitutes variables', () => {
    expect(renderTemplate("slug = '{{experiment.slug}}' AND n >= {{ parameters.min_days }}", scope)).toBe(
      "slug = 'onboarding-test' AND n >= 3"
    );
    expect(renderTemplate('{{experiment.enrollment_period}} days', scope)).toBe('7 days');
  });

  it('expands built-in macros', () => {
    expect(renderTemplate('{{agg_any("has_pinned_tab")}}', scope)).toBe('COALESCE(LOGICAL_OR(has_pinned_tab), FALSE)');
    expect(renderTemplate('{{agg_histogram_mean("payload.histograms.gc_ms")}}', scope)).toBe(
      [
        'SAFE_DIVIDE(',
        '  SUM(CAST(JSON_EXTRACT_SCALAR(payload.histograms.gc_ms, "$.sum") AS int64)),',
        '  SUM((SELECT SUM(value) FROM UNNEST(mozfun.hist.extract(payload.histograms.gc_ms).values)))',
        ')',
      ].join('\n')
    );
  });

  it('passes variables as macro arguments', () => {
    expect(renderTemplate('{{agg_sum(experiment.slug)}}', scope)).toBe('COALESCE(SUM(onboarding-test), 0)');
  });

  it('uses a given macro table', () => {
    const macros = macroTable(new Map([['agg_max', { slug: 'agg_max', definition: 'MAX({select_expr})' }]]));

    expect(renderTemplate('{{agg_max("x")}}', scope, macros)).toBe('MAX(x)');
    expect(macros.get('agg_sum')).toBe(BUILTIN_MACROS.get('agg_sum'));
  });

  describe('errors', () => {
    it('reports an undefined variable with its position', () => {
      const error = renderError('a = {{experiment.start_date_str}}');

      expect(error.kind).toBe('MissingTemplateVariable');
      expect(error.message).toBe("Undefined template variable 'experiment.start_date_str' at line 1, column 5");
    });

    it('reports an undefined macro', () => {
      const error = renderError('{{agg_p99("x")}}');

      expect(error.kind).toBe('MissingTemplateVariable');
      expect(error.message).toBe("Undefined macro 'agg_p99' at line 1, column 1");
    });

    it('reports a macro called with the wrong number of arguments', () => {
      const error = renderError('{{agg_sum("x", "y")}}');

      expect(error.kind).toBe('InvalidTemplateValue');
      expect(error.message).toBe("Macro 'agg_sum' takes exactly one argument, got 2 at line 1, column 1");
    });

    it('does not resolve inherited properties', () => {
      const error = renderError('{{ experiment.constructor }}');

      expect(error.kind).toBe('MissingTemplateVariable');
      expect(error.message).toBe("Undefined template variable 'experiment.constructor' at line 1, column 1");
    });

    it('reports a namespace used as a value', () => {
      const error = renderError('{{ experiment }}');

      expect(error.kind).toBe('InvalidTemplateValue');
      expect(error.message).toBe("'experiment' is a namespace, not a value, at line 1, column 1");
    });
  });
});

describe('Experiment Context', () => {
  it('exposes experiment variables', () => {
    expect(
      experimentScope({
        slug: 'onboarding-test',
        startDate: '2024-03-01',
        enrollmentPeriod: 7,
        endDate: '2024-04-01',
        referenceBranch: 'control',
        appName: 'firefox_desktop',
      })
    ).toEqual({
      slug: 'onboarding-test',
      start_date_str: '2024-03-01',
      last_enrollment_date_str: '2024-03-08',
      end_date_str: '2024-04-01',
      enrollment_period: 7,
      reference_branch: 'control',
      app_name: 'firefox_desktop',
    });
  });

  it('leaves absent values undefined', () => {
    expect(experimentScope({ slug: 'onboarding-test', startDate: '2024-03-01' })).toEqual({
      slug: 'onboarding-test',
      start_date_str: '2024-03-01',
    });
  });

  it('adds enrollment days across month and year ends', () => {
    expect(lastEnrollmentDate('2024-02-25', 7)).toBe('2024-03-03');
    expect(lastEnrollmentDate('2023-12-28', 14)).toBe('2024-01-11');
  });

  it('rejects malformed dates', () => {
    expect(() => experimentScope({ slug: 'x', startDate: '03/01/2024' })).toThrow(
      "experiment.start_date must be a YYYY-MM-DD date, got '03/01/2024'"
    );
  });

  it('rejects dates that do not exist', () => {
    expect(() => experimentScope({ slug: 'x', startDate: '2024-02-30' })).toThrow(
      "experiment.start_date must be a YYYY-MM-DD date, got '2024-02-30'"
    );
    expect(() => lastEnrollmentDate('2023-02-29', 7)).toThrow(TemplateError);
    expect(lastEnrollmentDate('2024-02-29', 1)).toBe('2024-03-01');
  });

  it('layers configured experiment details over the caller context', () => {
    expect(resolveExperiment({}, undefined)).toBeUndefined();
    expect(resolveExperiment({ startDate: '2024-03-01' }, { slug: 'onboarding-test', startDate: '2024-02-01', enrollmentPeriod: 7 })).toEqual({
      slug: 'onboarding-test',
      startDate: '2024-03-01',
      enrollmentPeriod: 7,
    });
    expect(experimentScope({ enrollmentPeriod: 7 })).toEqual({ enrollment_period: 7 });
  });

  it('renders parameter values', () => {
    expect(renderParameterValue(0.5)).toBe('0.5');
    expect(renderParameterValue({ control: 'a', treatment: 'b' })).toBe(
      'CASE e.branch WHEN "control" THEN "a" WHEN "treatment" THEN "b" END'
    );
  });

  it('builds the query scope', () => {
    const parameters = new Map([
      ['min_days', { slug: 'min_days', value: 3, distinctByBranch: false }],
    ]);

    expect(queryScope(parameters)).toEqual({ parameters: { min_days: '3' } });
    const reserved = new Map([['__proto__', { slug: '__proto__', value: 5, distinctByBranch: false }]]);
    expect(renderTemplate('{{ parameters.__proto__ }}', queryScope(reserved))).toBe('5');
    expect(queryScope(parameters, { slug: 'onboarding-test' })).toEqual({
      parameters: { min_days: '3' },
      experiment: { slug: 'onboarding-test' },
    });
  });
});
