export const PROJECT_CATALOG = Symbol('PROJECT_CATALOG');
export const RATE_LIMITER = Symbol('RATE_LIMITER');
export const SERVICE_STARTED_AT = Symbol('SERVICE_STARTED_AT');
