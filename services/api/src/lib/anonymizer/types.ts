export type BlockStyle = {
  isHeading: boolean;
  headingLevel?: number;
};

export type ReportBlock = {
  text: string;
  style: BlockStyle;
};

export type ReportDocument = {
  blocks: ReportBlock[];
};

export type PatientIdentity = {
  firstName: string;
  lastName: string;
};

export type ReplacementRule = readonly [source: string, replacement: string];
