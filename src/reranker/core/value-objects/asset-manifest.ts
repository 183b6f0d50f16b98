/**
 * Files the model handle is built from, relative to the model base URL.
 * Fetched in this order.
 */
export const MODEL_ASSET_MANIFEST = [
  'tokenizer.json',
  'model.safetensors',
  'config.json',
  'config_sentence_transformers.json',
  '1_Dense/model.safetensors',
  '1_Dense/config.json',
  'special_tokens_map.json',
] as const;
