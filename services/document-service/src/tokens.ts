export const SERVICE_CONFIG = Symbol('SERVICE_CONFIG');
export const COMPLETION_CLIENT = Symbol('COMPLETION_CLIENT');
export const OCR_ENGINE = Symbol('OCR_ENGINE');
export const PDF_RASTERIZER = Symbol('PDF_RASTERIZER');
