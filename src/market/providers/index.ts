import { exchangeRateHost } from "./exchangerate_host";
import { goldApiCom } from "./gold_api_com";
import { goldApiIo } from "./goldapi_io";
import { goldPriceOrg } from "./goldprice_org";
import { metalsApi } from "./metals_api";
import { metalsLive } from "./metals_live";
import type { ProviderDef } from "./schema";
import { yahooFutures } from "./yahoo_futures";

export const PROVIDERS: ReadonlyMap<string, ProviderDef> = new Map(
  [goldApiCom, goldApiIo, goldPriceOrg, metalsLive, exchangeRateHost, yahooFutures, metalsApi].map(p => [p.id, p]),
);

export type { Credentials, ParsedPrice, ParseResult, ProviderDef } from "./schema";
