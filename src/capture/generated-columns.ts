/**
 * Column names usually filled in by the database
 */
const GENERATED_COLUMN_NAMES = [
  "id",
  "createdat",
  "createddate",
  "timestamp",
  "rowversion",
  "modifiedat",
  "modifieddate",
];

/**
 * Case-insensitive, ignores underscores, matches by equality or suffix (`user_id`, `CreatedAt`)
 */
export function isGeneratedColumn(name: string): boolean {
  const normalized = name.replace(/_/g, "").toLowerCase();
  return GENERATED_COLUMN_NAMES.some(
    (generated) => normalized === generated || normalized.endsWith(generated),
  );
}
