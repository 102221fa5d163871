import { AssetKind } from '../enums/asset-kind.enum';

export interface AssetFailure {
    kind: AssetKind;
    index: number;
    reference: string;
    url?: string;
    reason: string;
}

export interface FetchedResource {
    body: Buffer;
    charset?: string;
}

export interface ExtractedPage {
    html: string;
    stylesheetHrefs: string[];
    scriptSrcs: string[];
}

export interface ArchiveResult {
    paths: string[];
    failures: AssetFailure[];
}

export interface NewPageRecord {
    id: string;
    sourceUrl: string;
    html: string;
    cssPaths: string[];
    jsPaths: string[];
    assetFailures: AssetFailure[];
}

export interface RenderablePage {
    html: string;
    cssPaths: string[];
    jsPaths: string[];
}
