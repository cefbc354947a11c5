export const GEMINI_HTTP = 'GEMINI_HTTP';

export interface GeminiEmbedContentRequest {
  content: {
    parts: Array<{ text: string }>;
  };
  outputDimensionality?: number;
}

export interface GeminiEmbedContentResponse {
  embedding?: {
    values?: number[];
  };
}
