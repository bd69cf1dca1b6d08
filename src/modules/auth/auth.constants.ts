export const AUTH_COOKIE_NAME = 'mb_session';
