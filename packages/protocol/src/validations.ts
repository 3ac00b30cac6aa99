import { Ajv } from 'ajv';

import {
  JsonRpcError,
  jsonRpcErrorMessageSchema,
  jsonRpcNotificationMessageSchema,
  jsonRpcRequestMessageSchema,
  jsonRpcResponseMessageSchema,
} from '#jsonrpc';
import { MCP_ERROR_CODES } from '#primitives';

import schema from './schemas/schema.json';

import type { ValidateFunction } from 'ajv';

import type { InitializeRequest } from '#core';
import type { ElicitRequest } from '#elicitation';
import type { JsonRpcMessage } from '#jsonrpc';
import type { SetLevelRequest } from '#logging';
import type { McpClientReplyMap, McpServerReplyMap } from '#message';
import type {
  CancelledNotification,
  LoggingMessageNotification,
  ProgressNotification,
  ResourceUpdatedNotification,
} from '#notifications';
import type { GetPromptRequest } from '#prompts';
import type { ReadResourceRequest } from '#resources';
import type { CreateMessageRequest } from '#sampling';
import type { CallToolRequest } from '#tools';

/** validates a value and narrows it to the message type, throwing on mismatch */
export type MessageValidator<M> = (data: unknown) => M;

/** parameters of the list requests, which only carry an optional cursor */
type PaginatedParams = { cursor?: string };

/* eslint-disable @typescript-eslint/naming-convention */
/** validation functions for inbound request parameters, keyed by method */
export interface RequestParamsValidator {
  'initialize': MessageValidator<InitializeRequest['params']>;
  'tools/list': MessageValidator<PaginatedParams>;
  'tools/call': MessageValidator<CallToolRequest['params']>;
  'resources/list': MessageValidator<PaginatedParams>;
  'resources/templates/list': MessageValidator<PaginatedParams>;
  'resources/read': MessageValidator<ReadResourceRequest['params']>;
  'resources/subscribe': MessageValidator<ReadResourceRequest['params']>;
  'resources/unsubscribe': MessageValidator<ReadResourceRequest['params']>;
  'prompts/list': MessageValidator<PaginatedParams>;
  'prompts/get': MessageValidator<GetPromptRequest['params']>;
  'logging/setLevel': MessageValidator<SetLevelRequest['params']>;
  'sampling/createMessage': MessageValidator<CreateMessageRequest['params']>;
  'elicitation/create': MessageValidator<ElicitRequest['params']>;
}

/** validation functions for request results, keyed by method */
export type ResultValidator = {
  [M in keyof (McpServerReplyMap & McpClientReplyMap)]: MessageValidator<
    (McpServerReplyMap & McpClientReplyMap)[M]
  >;
};

/** validation functions for inbound notification parameters, keyed by method */
export interface NotificationParamsValidator {
  'notifications/cancelled': MessageValidator<CancelledNotification['params']>;
  'notifications/progress': MessageValidator<ProgressNotification['params']>;
  'notifications/resources/updated': MessageValidator<
    ResourceUpdatedNotification['params']
  >;
  'notifications/message': MessageValidator<
    LoggingMessageNotification['params']
  >;
}
/* eslint-enable @typescript-eslint/naming-convention */

/** combined interface containing all message validation functions */
export interface Validators {
  requests: RequestParamsValidator;
  results: ResultValidator;
  notifications: NotificationParamsValidator;
}

const validateJsonRpcMessageWithoutErrorThrown = new Ajv({
  strict: false,
}).compile<JsonRpcMessage>({
  anyOf: [
    jsonRpcRequestMessageSchema,
    jsonRpcResponseMessageSchema,
    jsonRpcNotificationMessageSchema,
    jsonRpcErrorMessageSchema,
  ],
});

/**
 * creates a validation function for one schema definition
 * @param ajv AJV instance with the protocol schema loaded
 * @param name JSON schema definition name
 * @returns validation function that validates and narrows the value
 */
export function createMessageValidator<M>(
  ajv: Ajv,
  name: string,
): MessageValidator<M> {
  const verify: ValidateFunction<M> | undefined = ajv.getSchema<M>(
    `#/definitions/${name}`,
  );

  if (!verify) {
    throw new Error(`Message type ${name} isn't defined in the protocol schema`);
  }

  return (data: unknown): M => {
    if (verify(data)) {
      return data;
    }

    throw new JsonRpcError({
      code: MCP_ERROR_CODES.INVALID_PARAMS,
      message: `Validation error for ${name}: ${ajv.errorsText(verify.errors)}`,
    });
  };
}

/**
 * builds the validators for every typed payload of the protocol
 * @returns validation functions grouped by message kind
 */
export function createValidators(): Validators {
  const ajv = new Ajv({
    schemas: [schema],
    strict: false,
    allowUnionTypes: true,
  });

  const create = <M>(name: string): MessageValidator<M> =>
    createMessageValidator<M>(ajv, name);

  return {
    requests: {
      'initialize': create('InitializeRequestParams'),
      'tools/list': create('PaginatedRequestParams'),
      'tools/call': create('CallToolRequestParams'),
      'resources/list': create('PaginatedRequestParams'),
      'resources/templates/list': create('PaginatedRequestParams'),
      'resources/read': create('ResourceUriRequestParams'),
      'resources/subscribe': create('ResourceUriRequestParams'),
      'resources/unsubscribe': create('ResourceUriRequestParams'),
      'prompts/list': create('PaginatedRequestParams'),
      'prompts/get': create('GetPromptRequestParams'),
      'logging/setLevel': create('SetLevelRequestParams'),
      'sampling/createMessage': create('CreateMessageRequestParams'),
      'elicitation/create': create('ElicitRequestParams'),
    },
    results: {
      'initialize': create('InitializeResult'),
      'ping': create('EmptyResult'),
      'tools/call': create('CallToolResult'),
      'tools/list': create('ListToolsResult'),
      'resources/list': create('ListResourcesResult'),
      'resources/templates/list': create('ListResourceTemplatesResult'),
      'resources/read': create('ReadResourceResult'),
      'resources/subscribe': create('EmptyResult'),
      'resources/unsubscribe': create('EmptyResult'),
      'prompts/list': create('ListPromptsResult'),
      'prompts/get': create('GetPromptResult'),
      'logging/setLevel': create('EmptyResult'),
      'sampling/createMessage': create('CreateMessageResult'),
      'elicitation/create': create('ElicitResult'),
      'roots/list': create('ListRootsResult'),
    },
    notifications: {
      'notifications/cancelled': create('CancelledNotificationParams'),
      'notifications/progress': create('ProgressNotificationParams'),
      'notifications/resources/updated': create(
        'ResourceUpdatedNotificationParams',
      ),
      'notifications/message': create('LoggingMessageNotificationParams'),
    },
  };
}

/** validators shared by every peer in this process */
export const validators: Validators = createValidators();

/**
 * validates JSON-RPC message structure and returns typed envelope
 * @param message the message to validate
 * @returns validated JSON-RPC message
 */
export function validateJsonRpcMessage(message: unknown): JsonRpcMessage {
  if (!validateJsonRpcMessageWithoutErrorThrown(message)) {
    throw new Error(
      `Invalid JSON-RPC message: ${new Ajv().errorsText(validateJsonRpcMessageWithoutErrorThrown.errors)}`,
    );
  }

  return message;
}
