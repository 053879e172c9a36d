export type PayloadKind =
  | 'xlsx_zip'
  | 'xls_ole'
  | 'html_interstitial'
  | 'json_text'
  | 'xml_text'
  | 'csv_text'
  | 'text_plain'
  | 'binary_unknown';

export interface OpenDataResource {
  resourceId: string;
  name: string;
  format: string | null;
  /** Absolute, path-encoded link, or null when the portal lists none. */
  downloadUrl: string | null;
}

export interface PublisherDataset {
  id: string;
  title: string | null;
}

export type OpenDataInput =
  | {
      mode: 'dataset';
      datasetId: string;
      maxResources?: number;
    }
  | {
      mode: 'publisher';
      publisherId: string;
      range?: [number, number];
      maxDatasets?: number;
      maxResources?: number;
    };

export type DownloadStage = 'api-v1' | 'direct' | 'api-v1-warmed';

export interface DownloadAttempt {
  stage: DownloadStage;
  reason: string;
}

export interface DownloadedFile {
  resourceId: string;
  resourceName: string;
  stage: DownloadStage;
  file: string;
  size: number;
  sha256: string;
  kind: PayloadKind;
}

export type DownloadOutcome =
  | ({ status: 'ok' } & DownloadedFile)
  | {
      status: 'error';
      resourceId: string;
      resourceName: string;
      reason: string;
      attempts: DownloadAttempt[];
    };

export type DatasetStatus = 'success' | 'partial' | 'failed';

export interface DatasetResult {
  datasetId: string;
  title: string | null;
  url: string;
  status: DatasetStatus;
  totalResources: number;
  downloaded: number;
  failed: number;
  outputDir: string;
  /** First files saved, for a quick look without opening downloads.json. */
  files: DownloadedFile[];
  error?: string;
}

export interface PublisherResult {
  publisherId: string;
  totalDatasets: number;
  datasetsSucceeded: number;
  datasetsPartial: number;
  datasetsFailed: number;
  totalFilesOk: number;
  totalFilesFailed: number;
  outputDir: string;
  datasets: Omit<DatasetResult, 'files'>[];
}

export type OpenDataResult = DatasetResult | PublisherResult;
