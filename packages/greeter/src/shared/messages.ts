import { z } from "zod";

// Enum values travel as bare snake_case strings.
export const AuthMessageTypeSchema = z.enum(["visible", "secret", "info", "error"]);
export const ErrorTypeSchema = z.enum(["auth_error", "error"]);

export type AuthMessageType = z.infer<typeof AuthMessageTypeSchema>;
export type ErrorType = z.infer<typeof ErrorTypeSchema>;

export const CreateSessionRequestSchema = z.object({
  type: z.literal("create_session"),
  username: z.string(),
});

export const PostAuthMessageResponseRequestSchema = z.object({
  type: z.literal("post_auth_message_response"),
  response: z.string().nullable(),
});

export const StartSessionRequestSchema = z.object({
  type: z.literal("start_session"),
  command: z.array(z.string()),
  env: z.array(z.string()),
});

export const CancelSessionRequestSchema = z.object({
  type: z.literal("cancel_session"),
});

export const GreetdRequestSchema = z.discriminatedUnion("type", [
  CreateSessionRequestSchema,
  PostAuthMessageResponseRequestSchema,
  StartSessionRequestSchema,
  CancelSessionRequestSchema,
]);

export const SuccessResponseSchema = z.object({
  type: z.literal("success"),
});

export const ErrorResponseSchema = z.object({
  type: z.literal("error"),
  error_type: ErrorTypeSchema,
  description: z.string(),
});

export const AuthMessageResponseSchema = z.object({
  type: z.literal("auth_message"),
  auth_message_type: AuthMessageTypeSchema,
  auth_message: z.string(),
});

export const GreetdResponseSchema = z.discriminatedUnion("type", [
  SuccessResponseSchema,
  ErrorResponseSchema,
  AuthMessageResponseSchema,
]);

export type CreateSessionRequest = z.infer<typeof CreateSessionRequestSchema>;
export type PostAuthMessageResponseRequest = z.infer<typeof PostAuthMessageResponseRequestSchema>;
export type StartSessionRequest = z.infer<typeof StartSessionRequestSchema>;
export type CancelSessionRequest = z.infer<typeof CancelSessionRequestSchema>;
export type GreetdRequest = z.infer<typeof GreetdRequestSchema>;

export type SuccessResponse = z.infer<typeof SuccessResponseSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
export type AuthMessageResponse = z.infer<typeof AuthMessageResponseSchema>;
export type GreetdResponse = z.infer<typeof GreetdResponseSchema>;

export type GreetdRequestType = GreetdRequest["type"];
export type GreetdResponseType = GreetdResponse["type"];

export function createSessionRequest(username: string): CreateSessionRequest {
  return { type: "create_session", username };
}

export function postAuthMessageResponse(response: string | null): PostAuthMessageResponseRequest {
  return { type: "post_auth_message_response", response };
}

export function startSessionRequest(command: string[], env: string[]): StartSessionRequest {
  return { type: "start_session", command: [...command], env: [...env] };
}

export function cancelSessionRequest(): CancelSessionRequest {
  return { type: "cancel_session" };
}

/**
 * Rebuilds a message with `type` first and the remaining fields in declaration
 * order, dropping anything the wire shape does not name.
 */
export function toWireRequest(request: GreetdRequest): GreetdRequest {
  switch (request.type) {
    case "create_session":
      return { type: request.type, username: request.username };
    case "post_auth_message_response":
      return { type: request.type, response: request.response };
    case "start_session":
      return { type: request.type, command: request.command, env: request.env };
    case "cancel_session":
      return { type: request.type };
  }
}

export function toWireResponse(response: GreetdResponse): GreetdResponse {
  switch (response.type) {
    case "success":
      return { type: response.type };
    case "error":
      return {
        type: response.type,
        error_type: response.error_type,
        description: response.description,
      };
    case "auth_message":
      return {
        type: response.type,
        auth_message_type: response.auth_message_type,
        auth_message: response.auth_message,
      };
  }
}

export function describeResponse(response: GreetdResponse): string {
  switch (response.type) {
    case "success":
      return "success";
    case "error":
      return `error(${response.error_type})`;
    case "auth_message":
      return `auth_message(${response.auth_message_type})`;
  }
}
