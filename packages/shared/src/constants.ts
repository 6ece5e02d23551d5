export const APP_VERSION = '1.0.0';

export const MIN_COOKING_TIME = 1;
export const MIN_AMOUNT = 1;

// Largest 32-bit signed integer
export const MAX_COOKING_TIME = 2147483647;
export const MAX_AMOUNT = 2147483647;

export const MAX_PAGE_SIZE = 100;

// Letters, digits and . @ + - _
export const USERNAME_PATTERN = /^[\w.@+-]+$/;

export const IMAGE_DATA_URL_PATTERN = /^data:image\/[a-z0-9.+-]+;base64,[A-Za-z0-9+/=\s]+$/i;
