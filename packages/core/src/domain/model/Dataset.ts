/** Reference to the XDM schema a dataset conforms to. */
export interface DatasetSchemaRef {
  readonly id: string;
  readonly contentType: string;
}

/** Profile and Identity enablement tags, e.g. `['enabled:true']`. */
export interface DatasetTags {
  readonly unifiedProfile?: readonly string[];
  readonly unifiedIdentity?: readonly string[];
}

export interface Dataset {
  readonly id: string;
  readonly name: string;
  readonly schemaRef?: DatasetSchemaRef;
  readonly description?: string;
  readonly tags?: DatasetTags;
  /** `DRAFT` or `ENABLED`. */
  readonly state?: string;
  readonly created?: number;
  readonly updated?: number;
  readonly imsOrg?: string;
  readonly version?: string;
}

/** A file stored in a dataset as the result of a batch. */
export interface DataSetFile {
  readonly id: string;
  readonly dataSetId: string;
  readonly batchId: string;
  readonly name?: string;
  readonly sizeInBytes?: number;
  readonly records?: number;
  readonly isValid?: boolean;
  readonly created?: number;
}
