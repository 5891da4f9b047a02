/**
 * Dosazení pozičních placeholderů `{0}`, `{1}` ... do šablony.
 *
 * Prázdné `{}` bere další index v pořadí. Ostatní složené závorky zůstávají
 * beze změny, takže šablonou může být i JMESPath výraz.
 */
export function formatTemplate(
  template: string,
  resolve: (index: number) => string | undefined,
): string {
  // Fast path - no placeholders
  if (!template.includes('{')) {
    return template;
  }

  let auto = 0;
  return template.replace(/\{(\d*)\}/g, (match, digits: string) => {
    const index = digits === '' ? auto++ : Number(digits);
    return resolve(index) ?? match;
  });
}
