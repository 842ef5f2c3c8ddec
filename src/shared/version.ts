export const APP_NAME = 'ai-news-digest';
export const APP_VERSION = '0.1.0';
