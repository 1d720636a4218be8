/**
 * Hazard categories the guard model is prompted with, keyed by code.
 */
export const SAFETY_CATEGORIES: Readonly<Record<string, string>> = Object.freeze({
  S1: 'Violent Crimes',
  S2: 'Non-Violent Crimes',
  S3: 'Sex Crimes',
  S4: 'Child Exploitation',
  S5: 'Defamation',
  S6: 'Specialized Advice',
  S7: 'Privacy',
  S8: 'Intellectual Property',
  S9: 'Indiscriminate Weapons',
  S10: 'Hate',
  S11: 'Self-Harm',
  S12: 'Sexual Content',
  S13: 'Elections',
  S14: 'Code Interpreter Abuse',
});

/** Description for a category code, case-insensitive */
export function describeCategory(code: string): string | undefined {
  return SAFETY_CATEGORIES[code.toUpperCase()];
}

/** The category block embedded in classification prompts */
export function formatCategoryList(): string {
  return Object.entries(SAFETY_CATEGORIES)
    .map(([code, description]) => `${code}: ${description}.`)
    .join('\n');
}
