/**
 * Placeholder substitution
 *
 * `[name]` in an output template is replaced by the parameter's text.
 * `[name]` in a condition template is replaced by a literal of the
 * condition grammar, so the rendered text can be evaluated on its own.
 * Names without a parameter are left as written.
 */

import type { ParameterSet, ParameterValue } from '../types/index.js';

const PLACEHOLDER = /\[([A-Za-z_][\w-]*)\]/g;

function substitute(
    template: string,
    params: ParameterSet | undefined,
    render: (value: ParameterValue) => string
): string {
    if (!params) {
        return template;
    }
    return template.replace(PLACEHOLDER, (whole, name: string) =>
        Object.prototype.hasOwnProperty.call(params, name) ? render(params[name]) : whole
    );
}

export function formatTemplate(template: string, params?: ParameterSet): string {
    return substitute(template, params, String);
}

export function renderCondition(condition: string, params?: ParameterSet): string {
    return substitute(condition, params, toLiteral);
}

/**
 * Source text of a condition literal for a parameter value
 */
export function toLiteral(value: ParameterValue): string {
    if (typeof value === 'string') {
        return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
    }
    if (typeof value === 'boolean') {
        return value ? 'true' : 'false';
    }
    return String(value);
}

/**
 * Distinct placeholder names in a template, in order of first use
 */
export function placeholderNames(template: string): string[] {
    const names = new Set<string>();
    for (const match of template.matchAll(PLACEHOLDER)) {
        names.add(match[1]);
    }
    return [...names];
}
