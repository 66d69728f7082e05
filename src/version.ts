/** Library version, reported in user agents and by the CLI */
export const VERSION = '0.1.0';

/** Engine major version this build is written against */
export const SUPPORTED_ENGINE_MAJOR = 1;
