export * from "@ferry/app";
export * from "@ferry/core";
