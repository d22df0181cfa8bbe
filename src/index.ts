// Gate
export { ComplianceGate, DEFAULT_GATE_OPTIONS, matchedColorsAsHex } from "./lib/compliance/gate";
export type { ComplianceGateInit, ComplianceGateOptions, ComplianceVerdict } from "./lib/compliance/gate";
export { resolveBrand } from "./lib/compliance/brand";
export type { ResolveBrandOptions, ResolvedBrand } from "./lib/compliance/brand";

// Colours
export { extractPalette, DEFAULT_PALETTE_SEED, DEFAULT_PALETTE_SIZE } from "./lib/colors/palette";
export type { PaletteOptions } from "./lib/colors/palette";
export { validateBrandColors, DEFAULT_COLOR_OPTIONS } from "./lib/colors/compliance";
export type { BrandColors } from "./lib/colors/compliance";
export { generateShadeSet, DEFAULT_SHADE_STEP, SHADE_RANGE } from "./lib/colors/shades";
export { parseHexColor, rgbDistance, toHex } from "./lib/colors/vision";
export type * from "./lib/colors/types";

// Images
export { decodeImage, scaleToFit, createRaster } from "./lib/images/raster";
export type { RasterImage, Rgba } from "./lib/images/raster";
export { detectLogo, DEFAULT_LOGO_OPTIONS, DEFAULT_LOGO_THRESHOLD, DEFAULT_LOGO_SCALES } from "./lib/images/logo-detector";
export type { BoundingBox, LogoDetectionOptions, LogoMatch } from "./lib/images/logo-detector";

// Legal
export { screenText, mergeVerdicts } from "./lib/legal/screener";
export type { ScreenOptions } from "./lib/legal/screener";
export { parseTermTable, loadTermTable } from "./lib/legal/term-table";
export { SEVERITIES, SEVERITY_RANK, compareSeverity, isBlocking, isSeverity, maxSeverity } from "./lib/legal/severity";
export type { Severity } from "./lib/legal/severity";
export type * from "./lib/legal/types";

// Campaign pipeline
export { runCampaign } from "./lib/pipeline/campaign";
export type { CampaignDependencies, CampaignRunResult } from "./lib/pipeline/campaign";
export { loadCampaignBrief, parseCampaignBrief } from "./lib/pipeline/brief";
export { buildReport, reportFileName, writeReport } from "./lib/report/reporter";
export { SharpCreativeComposer, placedLogoSize } from "./lib/creatives/composer";
export type { ComposedCreative, CreativeComposer, CreativeRequest } from "./lib/creatives/composer";
export { passthroughTranslator, languageForRegion } from "./lib/creatives/translator";
export type { MessageTranslator } from "./lib/creatives/translator";
export { BlobUploader, createUploader } from "./lib/storage/blob-upload";
export type { AssetUploader, FailedUpload, UploadBatch, UploadedAsset } from "./lib/storage/blob-upload";

// Ambient
export { loadConfig, gateOptionsFromConfig } from "./lib/config";
export type { AppConfig } from "./lib/config";
export { GateError, InvalidImageError, ConfigurationError, CampaignBlockedError, isGateError } from "./lib/errors";
export type { GateErrorCode } from "./lib/errors";
export * from "./types/api";
