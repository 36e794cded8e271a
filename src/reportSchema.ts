/** Version of the JSON shape produced by the error `toJSON()` reports. */
export const REPORT_SCHEMA_VERSION = '1';
