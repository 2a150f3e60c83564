/**
 * Chat model types.
 *
 * Wire shapes follow the OpenAI chat-completions API; the normalized shapes
 * are what the extractor and generator work with.
 */

// ---------------------------------------------------------------------------
// Normalized request
// ---------------------------------------------------------------------------

export interface TextPart {
  type: "text";
  text: string;
}

/** A URL, path or data URI pointing at an image. */
export interface ImageReferencePart {
  type: "image_reference";
  imageReference: string;
}

/**
 * A part of a kind this service does not use (audio, files, ...). It is kept
 * so normalization never drops a part; the extractors skip it.
 */
export interface UnrecognizedPart {
  type: "unrecognized";
  originalType: string;
}

export type ContentPart = TextPart | ImageReferencePart | UnrecognizedPart;

/** A chat message whose content always holds at least one part. */
export interface Message {
  role: string;
  content: ContentPart[];
}

export interface ChatCompletionRequest {
  model?: string;
  messages: Message[];
}

// ---------------------------------------------------------------------------
// Wire response
// ---------------------------------------------------------------------------

export interface ChatCompletionChoice {
  index: number;
  message: {
    role: "assistant";
    content: string;
  };
  finish_reason: "stop";
}

export interface ChatCompletionResponse {
  id: string;
  object: "chat.completion";
  created: number;
  model: string;
  choices: ChatCompletionChoice[];
  usage: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

export interface ModelListResponse {
  object: "list";
  data: Array<{
    id: string;
    object: "model";
    created: number;
    owned_by: string;
  }>;
}
