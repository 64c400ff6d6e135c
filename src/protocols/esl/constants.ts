/**
 * Event socket constants.
 * @module esl/constants
 */
export const ESL_DEFAULT_HOST = '127.0.0.1';
export const ESL_DEFAULT_PORT = 8021;
export const ESL_DEFAULT_PASSWORD = 'ClueCon';
export const ESL_DEFAULT_CONNECT_TIMEOUT_MS = 5000;
export const ESL_DEFAULT_MAX_BODY_BYTES = 16 * 1024 * 1024;

/** Line terminator written after every outbound command line. */
export const ESL_LINE_TERMINATOR = '\r\n';

/** `Content-Type` values understood by the framer. */
export enum EslContentType {
    AuthRequest = 'auth/request',
    CommandReply = 'command/reply',
    ApiResponse = 'api/response',
    EventPlain = 'text/event-plain',
}

export const ESL_REPLY_OK = '+OK';
export const ESL_REPLY_AUTH_ACCEPTED = '+OK accepted';

/** Key under which the nested body of an event is stored. */
export const ESL_EVENT_BODY_KEY = '_body';
