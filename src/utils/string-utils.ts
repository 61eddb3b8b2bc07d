export abstract class StringUtils {
  /**
   * Replaces every `${key}` or `${key:default}` placeholder in `raw` with the
   * value computed for `key`, falling back to the default when the computed
   * value is missing.
   */
  public static format(
    raw: string,
    compute: (key: string) => string | null | undefined,
  ): string {
    const placeholders = [
      ...raw.matchAll(/\$\{\s*([^\}\:\s]+)\s*\:?\s*([^\}]+\s*)?\s*\}/g),
    ];
    if (!placeholders.length) {
      return raw;
    }

    const fields: {[placeholder: string]: string} = {};
    for (const matchGroups of placeholders) {
      const key = matchGroups[1].trim();
      const defaultValue =
        matchGroups[2] !== undefined ? matchGroups[2].trim() : null;

      let computed = compute(key);
      if (computed === null || computed === undefined) {
        if (defaultValue === null) {
          throw new Error('Missing required environment variable ' + key);
        }
        computed = defaultValue;
      }
      fields[matchGroups[0]] = computed;
    }

    let output = raw;
    for (const [placeholder, value] of Object.entries(fields)) {
      output = output.split(placeholder).join(value);
    }
    if (output.indexOf('${') !== -1) {
      throw new Error('Not all arguments provided to format string');
    }
    return output;
  }

  public static isBlank(raw: string | null | undefined): boolean {
    return raw === null || raw === undefined || raw.trim().length < 1;
  }

  /**
   * Appends a line to a free-text field, never overwriting what is there.
   */
  public static appendLine(
    existing: string | null | undefined,
    line: string,
  ): string {
    return [existing ?? '', line]
      .map(o => o.trim())
      .filter(o => o.length > 0)
      .join('\n');
  }
}
