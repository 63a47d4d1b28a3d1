/**
 * Built-in document templates
 */

export interface BuiltinTemplate {
  name: string;
  yaml: string;
}

/**
 * Generic schedule: default header patterns, literal header labels
 */
export const GENERIC_TEMPLATE: BuiltinTemplate = {
  name: 'generic',
  yaml: `version: 1
name: generic
description: Any English-language program; date headers keep their literal text
fallback_date: N/A
break_keywords: [break, lunch, dinner, tea, coffee, registration]
`,
};

/**
 * Two-day conference program whose headers read "May 10 (Day 1)" or "DAY 2".
 * Registration is listed as a session in this program, not as a break.
 */
export const TWO_DAY_CONFERENCE_TEMPLATE: BuiltinTemplate = {
  name: 'two-day-conference',
  yaml: `version: 1
name: two-day-conference
description: Two-day conference (May 10-11, 2025) with Day 1 / Day 2 headers
fallback_date: N/A
date_labels:
  - match: day 1
    label: May 10, 2025 (Day 1)
  - match: may 10
    label: May 10, 2025 (Day 1)
  - match: day 2
    label: May 11, 2025 (Day 2)
  - match: may 11
    label: May 11, 2025 (Day 2)
break_keywords: [break, lunch, dinner, tea, coffee]
`,
};

export const BUILTIN_TEMPLATES: BuiltinTemplate[] = [
  GENERIC_TEMPLATE,
  TWO_DAY_CONFERENCE_TEMPLATE,
];

export const DEFAULT_TEMPLATE_NAME = 'generic';
