/**
 * Named failures raised by the export pipeline
 */

export class ZogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends ZogError {}

export class CollectionNotFoundError extends ZogError {
  constructor(
    readonly segment: string,
    readonly resolvedPath: string[] = []
  ) {
    const under = resolvedPath.length > 0 ? ` under "${resolvedPath.join("/")}"` : "";
    super(`"${segment}" is not a Zotero collection${under}`);
  }
}

export class RelationShapeError extends ZogError {
  constructor(
    readonly itemKey: string,
    readonly received: string
  ) {
    super(`Item ${itemKey} has unsupported dc:relation value (${received})`);
  }
}

export class ZoteroApiError extends ZogError {
  constructor(
    message: string,
    readonly path: string,
    readonly status?: number
  ) {
    super(message);
  }
}
