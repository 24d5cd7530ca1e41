export const UTF8_BOM = "\uFEFF";

export type CsvValue = string | number | null | undefined;

// Quote only when the field would otherwise break the row
const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: CsvValue): string {
    if (value === null || value === undefined) return "";
    const text = String(value);
    return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Serializes rows under a header line. Every row is written in
 * header order; missing keys become empty fields.
 */
export function toCsv<K extends string>(
    header: readonly K[],
    rows: ReadonlyArray<Record<K, CsvValue>>,
    { bom = false }: { bom?: boolean } = {}
): string {
    const lines = [
        header.map(escapeCsvField).join(","),
        ...rows.map(row => header.map(key => escapeCsvField(row[key])).join(",")),
    ];

    return (bom ? UTF8_BOM : "") + lines.join("\n") + "\n";
}
