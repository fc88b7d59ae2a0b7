export const SERVER_NAME = "fileops:files";
export const SERVER_VERSION = "0.1.0";
