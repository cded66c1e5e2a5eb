/** Cookie holding the visitor's running experiment variation. */
export const EXPERIMENTS_COOKIE = 'io.prismic.experiment';

/** Cookie holding the preview ref while a content preview is open. */
export const PREVIEW_COOKIE = 'io.prismic.preview';
