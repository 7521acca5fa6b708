import axios, { AxiosInstance } from "axios";
import { Inject, Injectable } from "@nestjs/common";
import { ConfigType } from "@nestjs/config";
import { createRedirectAxiosAdapter } from "./redirect-axios.adapter";
import { readerConfig } from "../../config/reader.config";
import { DEFAULT_ACCEPT_HEADER, DEFAULT_ACCEPT_LANGUAGE } from "../../common/constants";

/**
 * Axios instance shared by every fetch task. Redirects and default headers
 * come from the reader configuration. Bodies arrive as streams so the fetcher
 * can cap what it keeps.
 */
@Injectable()
export class FetchHttpClient {
    private readonly client: AxiosInstance;

    get: AxiosInstance['get'];

    constructor(
        @Inject(readerConfig.KEY) config: ConfigType<typeof readerConfig>,
    ) {
        this.client = axios.create({
            adapter: createRedirectAxiosAdapter(axios.getAdapter('http'), config.maxRedirects),
            headers: {
                'User-Agent': config.userAgent,
                Accept: DEFAULT_ACCEPT_HEADER,
                'Accept-Language': DEFAULT_ACCEPT_LANGUAGE,
            },
            responseType: 'stream',
            validateStatus: () => true,
        });
        this.get = this.client.get.bind(this.client);
    }
}
