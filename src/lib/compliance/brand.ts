import fs from "fs";
import type { BrandSpec } from "@/types/api";
import { ConfigurationError } from "../errors";
import { decodeImage, scaleToFit, type RasterImage } from "../images/raster";
import { parseHexColor } from "../colors/vision";
import type { ColorSample } from "../colors/types";

/** Brand spec with colours parsed and the logo decoded, ready for the gate */
export interface ResolvedBrand {
  logo: RasterImage;
  primary: ColorSample;
  secondary: ColorSample;
}

export interface ResolveBrandOptions {
  /** Encoded logo bytes, used instead of reading `logoPath` */
  logoBytes?: Buffer;
  /** Read the logo with its longest side at this size (the placed size) */
  logoSize?: number;
}

/**
 * Parse a brand spec's colours and decode its logo. Done once per campaign;
 * every problem here is a configuration error, fatal to the run.
 */
export async function resolveBrand(spec: BrandSpec, options: ResolveBrandOptions = {}): Promise<ResolvedBrand> {
  const primary = parseHexColor(spec.primaryColor);
  const secondary = parseHexColor(spec.secondaryColor);

  if (!options.logoBytes && !fs.existsSync(spec.logoPath)) {
    throw new ConfigurationError(`Brand logo not found at ${spec.logoPath}`);
  }

  const source = options.logoBytes ?? spec.logoPath;
  let logo: RasterImage;
  try {
    logo = await decodeImage(options.logoSize ? await scaleToFit(source, options.logoSize) : source);
  } catch (error) {
    throw new ConfigurationError(`Brand logo at ${spec.logoPath} cannot be decoded`, [], { cause: error });
  }

  return { logo, primary, secondary };
}
