export * from "./csv-exporter";
