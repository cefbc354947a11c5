import { CollectionSchema, SchemaField } from './interfaces/schema.interface';

export const EMBEDDING_DIMENSIONS = 768;

const embeddingField: SchemaField = {
  name: 'embedding',
  type: 'float[]',
  optional: true,
  numDim: EMBEDDING_DIMENSIONS,
};

/**
 * Published service records. Unknown collection names fall back to this
 * field list.
 */
export function publishedRecordsSchema(name: string): CollectionSchema {
  return {
    name,
    fields: [
      { name: 'id', type: 'string', optional: true },
      { name: 'nome_servico', type: 'string', facet: false },
      { name: 'orgao_gestor', type: 'string[]', facet: true },
      { name: 'resumo', type: 'string', facet: false },
      { name: 'tempo_atendimento', type: 'string', facet: false },
      { name: 'custo_servico', type: 'string', facet: true },
      { name: 'resultado_solicitacao', type: 'string', facet: true },
      { name: 'descricao_completa', type: 'string', facet: false },
      { name: 'autor', type: 'string', facet: true },
      { name: 'documentos_necessarios', type: 'string[]', facet: false, optional: true },
      { name: 'instrucoes_solicitante', type: 'string', facet: false, optional: true },
      { name: 'canais_digitais', type: 'string[]', facet: false, optional: true },
      { name: 'canais_presenciais', type: 'string[]', facet: false, optional: true },
      { name: 'servico_nao_cobre', type: 'string', facet: false, optional: true },
      { name: 'legislacao_relacionada', type: 'string[]', facet: false, optional: true },
      { name: 'tema_geral', type: 'string', facet: true },
      { name: 'publico_especifico', type: 'string[]', facet: true, optional: true },
      { name: 'fixar_destaque', type: 'bool', facet: true },
      { name: 'awaiting_approval', type: 'bool', facet: true },
      { name: 'published_at', type: 'int64', facet: false, optional: true },
      { name: 'is_free', type: 'bool', facet: true, optional: true },
      { name: 'agents', type: 'object', facet: false, optional: true },
      { name: 'extra_fields', type: 'object', facet: false, optional: true },
      { name: 'status', type: 'int32', facet: true },
      { name: 'created_at', type: 'int64', facet: false },
      { name: 'last_update', type: 'int64', facet: false },
      { name: 'search_content', type: 'string', facet: false },
      { name: 'buttons', type: 'object[]', facet: false, optional: true },
      embeddingField,
    ],
    defaultSortingField: 'last_update',
    enableNestedFields: true,
  };
}

/**
 * Snapshots written on every change to a published record.
 */
export function versionHistorySchema(name: string): CollectionSchema {
  return {
    name,
    fields: [
      { name: 'id', type: 'string', optional: true },
      { name: 'service_id', type: 'string', facet: true },
      { name: 'version_number', type: 'int64', facet: true },
      { name: 'created_at', type: 'int64', facet: false },
      { name: 'created_by', type: 'string', facet: true },
      { name: 'change_type', type: 'string', facet: true },
      { name: 'change_reason', type: 'string', facet: false, optional: true },
      { name: 'previous_version', type: 'int64', facet: false, optional: true },
      { name: 'is_rollback', type: 'bool', facet: true },
      { name: 'rollback_to_version', type: 'int64', facet: false, optional: true },
      { name: 'nome_servico', type: 'string', facet: false },
      { name: 'orgao_gestor', type: 'string[]', facet: false },
      { name: 'resumo', type: 'string', facet: false },
      { name: 'descricao_completa', type: 'string', facet: false, optional: true },
      { name: 'autor', type: 'string', facet: false },
      { name: 'tema_geral', type: 'string', facet: false },
      { name: 'status', type: 'int32', facet: true },
      { name: 'search_content', type: 'string', facet: false },
      { name: 'embedding_hash', type: 'string', facet: false, optional: true },
      { name: 'changed_fields_json', type: 'string', facet: false, optional: true },
      embeddingField,
    ],
    defaultSortingField: 'created_at',
    enableNestedFields: true,
  };
}

/**
 * Decommissioning overlay: one entry maps a legacy document to its
 * replacement in the published collection.
 */
export function redirectionOverlaySchema(name: string): CollectionSchema {
  return {
    name,
    fields: [
      { name: 'id', type: 'string', optional: true },
      { name: 'origem', type: 'string', facet: true },
      { name: 'id_servico_antigo', type: 'string', facet: false },
      { name: 'id_servico_novo', type: 'string', facet: false },
      { name: 'criado_em', type: 'int64', facet: false },
      { name: 'criado_por', type: 'string', facet: true },
      { name: 'observacoes', type: 'string', facet: false, optional: true },
      embeddingField,
    ],
    defaultSortingField: 'criado_em',
  };
}

/**
 * Aggregated index over every source collection.
 */
export function crossSourceSchema(name: string): CollectionSchema {
  return {
    name,
    fields: [
      { name: 'id', type: 'string', optional: true },
      { name: 'hub_id', type: 'string', facet: true },
      { name: 'source_type', type: 'string', facet: true },
      { name: 'source_collection', type: 'string', facet: true },
      { name: 'source_id', type: 'string', facet: true },
      { name: 'portal_tags', type: 'string[]', facet: true },
      { name: 'context_tags', type: 'string[]', facet: true },
      { name: 'title', type: 'string', facet: false },
      { name: 'description', type: 'string', facet: false, optional: true },
      { name: 'summary', type: 'string', facet: false, optional: true },
      { name: 'content', type: 'string', facet: false },
      { name: 'category', type: 'string', facet: true, optional: true },
      { name: 'subcategories', type: 'string[]', facet: true, optional: true },
      { name: 'tags', type: 'string[]', facet: true, optional: true },
      { name: 'status', type: 'int32', facet: true },
      { name: 'priority', type: 'int32', facet: false, optional: true },
      { name: 'relevance_score', type: 'int32', facet: false, optional: true },
      { name: 'created_at', type: 'int64', facet: false },
      { name: 'updated_at', type: 'int64', facet: false },
      embeddingField,
    ],
    defaultSortingField: 'updated_at',
    enableNestedFields: true,
  };
}
