import { DocumentFields, FieldValue, LogicalDocument } from './interfaces/search.interface';

const TITLE_FIELDS = ['titulo', 'title', 'nome_servico'] as const;
const HIDDEN_FIELDS = new Set(['embedding']);

const asString = (value: FieldValue | undefined): string | undefined =>
  typeof value === 'string' ? value : undefined;

/**
 * Splits a stored field bag into the typed known fields and the rest.
 * The title is taken from the first of `titulo`, `title`, `nome_servico`
 * that holds a string.
 */
export function toLogicalDocument(collection: string, fields: DocumentFields): LogicalDocument {
  const rawId = fields.id;
  const titleField = TITLE_FIELDS.find(name => typeof fields[name] === 'string');
  const title = titleField ? asString(fields[titleField]) : undefined;
  const category = asString(fields.category);
  const status = typeof fields.status === 'number' ? fields.status : undefined;

  const known = new Set<string>(['id', 'category', 'status']);
  if (titleField) {
    known.add(titleField);
  }

  const extraFields: DocumentFields = {};
  for (const [name, value] of Object.entries(fields)) {
    if (!known.has(name) && !HIDDEN_FIELDS.has(name)) {
      extraFields[name] = value;
    }
  }

  return {
    collection,
    id: typeof rawId === 'string' || typeof rawId === 'number' ? String(rawId) : '',
    ...(title !== undefined && { title }),
    ...(category !== undefined && { category }),
    ...(status !== undefined && { status }),
    extraFields,
  };
}
