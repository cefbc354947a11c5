export type FieldType =
  | 'string'
  | 'string[]'
  | 'int32'
  | 'int64'
  | 'float'
  | 'float[]'
  | 'bool'
  | 'object'
  | 'object[]';

export interface SchemaField {
  name: string;
  type: FieldType;
  facet?: boolean;
  optional?: boolean;
  /** Vector dimensionality, only for `float[]` embedding fields */
  numDim?: number;
}

export interface CollectionSchema {
  name: string;
  fields: SchemaField[];
  defaultSortingField: string;
  enableNestedFields?: boolean;
}
