/**
 * Replace {name} placeholders in a URL template
 */
export function fillTemplate(
  template: string,
  values: Record<string, string | number>,
): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) => {
    const value = values[name];
    if (value === undefined) {
      throw new Error(`Unknown placeholder ${placeholder} in "${template}"`);
    }
    return String(value);
  });
}
