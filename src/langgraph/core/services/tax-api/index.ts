import type { AppConfig } from "../../../../config/appConfig.js";
import type { Logger } from "../logger.js";
import { FakePropertyTaxApi } from "./fake-client.js";
import { LivePropertyTaxApi, type FetchLike } from "./live-client.js";
import { HttpDocumentPublisher } from "./document-publisher.js";
import type { PropertyTaxApi } from "./types.js";

export * from "./errors.js";
export * from "./records.js";
export * from "./types.js";
export { FakePropertyTaxApi, FAKE_SENTINELS, loadFakeTaxData } from "./fake-client.js";
export { LivePropertyTaxApi } from "./live-client.js";
export { HttpDocumentPublisher, type DocumentPublisher } from "./document-publisher.js";
export { interceptPropertyTaxApi, type FacadeInterceptOptions } from "./intercepted.js";

/** Picks the fake or the live implementation from configuration alone. */
export function createPropertyTaxApi(
  config: AppConfig,
  deps: { fetchImpl?: FetchLike; logger?: Logger } = {}
): PropertyTaxApi {
  if (config.useFakeApi) {
    return FakePropertyTaxApi.fromFile(config.fakeDataPath, deps.logger);
  }

  const { baseUrl, token } = config.iptuApi;
  if (!baseUrl || !token) {
    throw new Error("IPTU_API_URL and IPTU_API_TOKEN are required when IPTU_USE_FAKE_API is not enabled.");
  }
  const info = config.propertyInfoApi;
  const debt = config.activeDebtApi;
  const docs = config.documents;

  const documentPublisher = docs.uploadUrl
    ? new HttpDocumentPublisher(
        {
          uploadUrl: docs.uploadUrl,
          shortener:
            docs.shortenerUrl && docs.shortenerToken ? { baseUrl: docs.shortenerUrl, token: docs.shortenerToken } : null,
        },
        { fetchImpl: deps.fetchImpl }
      )
    : null;

  return new LivePropertyTaxApi(
    {
      iptuApi: { baseUrl, token },
      propertyInfoApi:
        info.baseUrl && info.token && info.publicKey
          ? { baseUrl: info.baseUrl, token: info.token, publicKey: info.publicKey }
          : null,
      activeDebtApi: debt.baseUrl && debt.accessKey ? { baseUrl: debt.baseUrl, accessKey: debt.accessKey } : null,
    },
    { fetchImpl: deps.fetchImpl, logger: deps.logger, documentPublisher }
  );
}
