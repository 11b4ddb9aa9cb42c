export const SKYFORM_VERSION = "0.1.0";
