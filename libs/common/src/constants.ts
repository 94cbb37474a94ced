export const SERVICE_NAME = 'SERVICE_NAME';

export const CORRELATION_ID_HEADER = 'x-correlation-id';
