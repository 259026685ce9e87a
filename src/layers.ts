import { Layer } from "effect";
import { CsvDirectoryDayFileSourceLayer } from "./meter-data/csv-directory.source.js";
import { YamlFileModelConfigLoaderLayer } from "./model-config/yaml-file.loader.js";

export const serviceLayers = (config: {
  readonly baseDir: string;
}) => Layer.mergeAll(
  YamlFileModelConfigLoaderLayer,
  CsvDirectoryDayFileSourceLayer(config),
);
