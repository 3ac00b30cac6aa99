import type { PrimitiveSchemaDefinition } from '#primitives';
import type { JsonRpcRequestData, JsonRpcResultData } from '#jsonrpc';

/**
 * request for structured user input, sent by the server toward the client
 * @see https://modelcontextprotocol.io/specification/2025-06-18/client/elicitation
 */
export interface ElicitRequest extends JsonRpcRequestData {
  method: 'elicitation/create';
  params: {
    message: string;
    requestedSchema?: {
      properties: Record<string, PrimitiveSchemaDefinition>;
      required?: string[];
      type: 'object';
    };
  };
}

/** flat field values collected from the user */
export type ElicitContent = Record<string, string | number | boolean>;

export interface ElicitResult extends JsonRpcResultData {
  action: 'accept' | 'decline' | 'cancel';
  content?: ElicitContent;
}
