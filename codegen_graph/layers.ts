import { isAbsolute, join, relative } from "node:path";
import type { GenerationConfig, LayerKind, TableSchema, WriteMode } from "./state.js";

export type LayerNames = {
  /** `sys_user_role` → `SysUserRole` */
  className: string;
  /** Package segment derived from the table: `sys_user_role` → `userrole`. */
  tableSegment: string;
  /** Package of the table's code, without the layer sub-package. */
  tablePackage: string;
  /** `/<module>/<tableSegment>` */
  requestPath: string;
};

export type LayerDefinition = {
  label: string;
  writeMode: WriteMode;
  fenceLanguage: string;
  /** Sub-package under the table package, `null` for resources. */
  subPackage: string | null;
  fileName: (names: LayerNames) => string;
  typeName: (names: LayerNames) => string;
  instructions: (names: LayerNames) => string[];
};

/** Fixed generation order; also the order layers appear in reports. */
export const LAYER_ORDER: readonly LayerKind[] = [
  "entity_base",
  "entity_impl",
  "data_access",
  "mapping_config",
  "service",
  "service_impl",
  "request_handler",
];

export const LAYER_DEFINITIONS: Readonly<Record<LayerKind, LayerDefinition>> = {
  entity_base: {
    label: "base entity",
    writeMode: "overwrite",
    fenceLanguage: "java",
    subPackage: "model",
    fileName: (n) => `Base${n.className}.java`,
    typeName: (n) => `Base${n.className}`,
    instructions: (n) => [
      `Declare the class Base${n.className} mapping every column of the table to a field.`,
      "Use UpperCamelCase for the class name and lowerCamelCase for field names.",
      "Choose Java types that match the PostgreSQL column types.",
      "Annotate with MyBatis-Plus @TableName on the class and @TableId on the primary key field when one exists.",
      "Document every field with a comment describing the column.",
    ],
  },
  entity_impl: {
    label: "entity implementation",
    writeMode: "preserve",
    fenceLanguage: "java",
    subPackage: "model",
    fileName: (n) => `${n.className}.java`,
    typeName: (n) => n.className,
    instructions: (n) => [
      `Declare the class ${n.className} extending Base${n.className} from the same package.`,
      "Implement java.io.Serializable.",
      "Do not declare any fields or methods.",
    ],
  },
  data_access: {
    label: "data access interface",
    writeMode: "overwrite",
    fenceLanguage: "java",
    subPackage: "mapper",
    fileName: (n) => `${n.className}Mapper.java`,
    typeName: (n) => `${n.className}Mapper`,
    instructions: (n) => [
      `Declare the interface ${n.className}Mapper extending BaseMapper<${n.className}>.`,
      `The entity lives in ${n.tablePackage}.model.`,
    ],
  },
  mapping_config: {
    label: "mapping configuration",
    writeMode: "overwrite",
    fenceLanguage: "xml",
    subPackage: null,
    fileName: (n) => `${n.className}Mapper.xml`,
    typeName: (n) => `${n.className}Mapper`,
    instructions: (n) => [
      "Emit a MyBatis 3 mapper XML document with the standard DOCTYPE.",
      `Use the namespace ${n.tablePackage}.mapper.${n.className}Mapper.`,
      `Declare a resultMap for ${n.tablePackage}.model.${n.className} covering every column.`,
    ],
  },
  service: {
    label: "service interface",
    writeMode: "overwrite",
    fenceLanguage: "java",
    subPackage: "service",
    fileName: (n) => `${n.className}Service.java`,
    typeName: (n) => `${n.className}Service`,
    instructions: (n) => [
      `Declare the interface ${n.className}Service extending IService<${n.className}>.`,
      `The entity lives in ${n.tablePackage}.model.`,
    ],
  },
  service_impl: {
    label: "service implementation",
    writeMode: "preserve",
    fenceLanguage: "java",
    subPackage: "service.impl",
    fileName: (n) => `${n.className}ServiceImpl.java`,
    typeName: (n) => `${n.className}ServiceImpl`,
    instructions: (n) => [
      `Declare the class ${n.className}ServiceImpl extending ServiceImpl<${n.className}Mapper, ${n.className}> and implementing ${n.className}Service.`,
      "Annotate the class with @Service.",
      `The mapper lives in ${n.tablePackage}.mapper and the interface in ${n.tablePackage}.service.`,
    ],
  },
  request_handler: {
    label: "request handler",
    writeMode: "overwrite",
    fenceLanguage: "java",
    subPackage: "controller",
    fileName: (n) => `${n.className}Controller.java`,
    typeName: (n) => `${n.className}Controller`,
    instructions: (n) => [
      `Declare the class ${n.className}Controller annotated with @RestController.`,
      `Map it with @RequestMapping("${n.requestPath}").`,
      `Inject ${n.tablePackage}.service.${n.className}Service with @Autowired.`,
      "Expose RESTful create, read, update, delete and list endpoints.",
    ],
  },
};

export function toPascalCase(tableName: string): string {
  return tableName
    .split("_")
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join("");
}

export function toTableSegment(tableName: string): string {
  const words = tableName.split("_").filter((word) => word.length > 0);
  const suffix = words.length > 1 ? words.slice(1) : words;
  return suffix.join("").toLowerCase();
}

export function resolveLayerNames(
  table: Pick<TableSchema, "table">,
  config: Pick<GenerationConfig, "basePackage" | "moduleName">,
): LayerNames {
  const tableSegment = toTableSegment(table.table);
  return {
    className: toPascalCase(table.table),
    tableSegment,
    tablePackage: `${config.basePackage}.${config.moduleName}.${tableSegment}`,
    requestPath: `/${config.moduleName}/${tableSegment}`,
  };
}

export function resolveWriteMode(
  layer: LayerKind,
  overrides: GenerationConfig["writeModeOverrides"] = {},
): WriteMode {
  return overrides[layer] ?? LAYER_DEFINITIONS[layer].writeMode;
}

export function resolveTargetPath(
  table: Pick<TableSchema, "table">,
  layer: LayerKind,
  config: Pick<GenerationConfig, "basePackage" | "moduleName" | "projectRoot">,
): string {
  const definition = LAYER_DEFINITIONS[layer];
  const names = resolveLayerNames(table, config);

  if (definition.subPackage === null) {
    return join(
      config.projectRoot,
      "src",
      "main",
      "resources",
      "mapper",
      config.moduleName,
      definition.fileName(names),
    );
  }

  return join(
    config.projectRoot,
    "src",
    "main",
    "java",
    ...names.tablePackage.split("."),
    ...definition.subPackage.split("."),
    definition.fileName(names),
  );
}

/** True when `targetPath` resolves to a location under `projectRoot`. */
export function isWithinProjectRoot(projectRoot: string, targetPath: string): boolean {
  const fromRoot = relative(projectRoot, targetPath);
  return fromRoot !== "" && !isAbsolute(fromRoot) && fromRoot.split(/[\\/]/)[0] !== "..";
}
