/** Every entity table lives in this Postgres schema. */
export const APP_SCHEMA = 'larp_manager';
