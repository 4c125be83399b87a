/** Header carrying the caller's owner identifier (Node lower-cases header names) */
export const USER_ID_HEADER = 'x-user-id';

/** Same header as shown in docs and CORS configuration */
export const USER_ID_HEADER_DISPLAY = 'X-User-Id';
