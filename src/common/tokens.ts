export const COURSE_AVAILABILITY_CONFIG = Symbol('COURSE_AVAILABILITY_CONFIG');
export const COURSE_CACHE = Symbol('COURSE_CACHE');
export const COURSE_SELECTOR = Symbol('COURSE_SELECTOR');
export const EMBEDDING_PROVIDER = Symbol('EMBEDDING_PROVIDER');
export const COURSE_SEARCH_PROVIDER = Symbol('COURSE_SEARCH_PROVIDER');
export const TELEMETRY_SINK = Symbol('TELEMETRY_SINK');
