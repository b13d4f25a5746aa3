/**
 * Injection tokens for the processing module.
 *
 * String tokens because the collaborators are interfaces, which have no
 * runtime representation NestJS could key on.
 */
export const STORAGE_CLIENT = 'STORAGE_CLIENT';
export const ANALYSIS_CLIENT = 'ANALYSIS_CLIENT';
export const PROCESSING_OPTIONS = 'PROCESSING_OPTIONS';
export const PROCESSING_CLOCK = 'PROCESSING_CLOCK';
