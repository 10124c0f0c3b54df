/**
 * In-process stand-in for the network: records each request and answers
 * with a canned response
 */

import { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface RecordedRequest {
  url: string;
  method: string;
  contentType: string;
  headers: InternalAxiosRequestConfig['headers'];
  body: string;
  httpsAgent: unknown;
}

export interface CannedResponse {
  status: number;
  body: string;
}

export type Responder = (request: RecordedRequest) => CannedResponse | Promise<CannedResponse>;

export function fakeAdapter(responder: Responder): {
  adapter: AxiosAdapter;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
    const request: RecordedRequest = {
      url: new URL(config.url ?? '', config.baseURL).toString(),
      method: (config.method ?? 'get').toUpperCase(),
      contentType: String(config.headers.get('Content-Type')),
      headers: config.headers,
      body: typeof config.data === 'string' ? config.data : '',
      httpsAgent: config.httpsAgent,
    };
    requests.push(request);

    const reply = await responder(request);
    const response: AxiosResponse<string> = {
      data: reply.body,
      status: reply.status,
      statusText: String(reply.status),
      headers: { 'content-type': 'text/xml; charset=utf-8' },
      config,
    };
    return response;
  };

  return { adapter, requests };
}

export function loginResponseXml(token: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<soapenv:Envelope xmlns:soapenv="http://schemas.xmlsoap.org/soap/envelope/">
  <soapenv:Body>
    <ns1:loginResponse xmlns:ns1="http://api.zuora.com/">
      <ns1:result>
        <ns1:ServerUrl>https://sandbox.zuora.example.com/apps/services/a/74.0</ns1:ServerUrl>
        <ns1:Session>${token}</ns1:Session>
      </ns1:result>
    </ns1:loginResponse>
  </soapenv:Body>
</soapenv:Envelope>`;
}

export const CREATE_RESPONSE_XML = `<?xml version="1.0" encoding="UTF-8"?>
<soapenv:Envelope xmlns:soapenv="http://schemas.xmlsoap.org/soap/envelope/">
  <soapenv:Body>
    <ns1:createResponse xmlns:ns1="http://api.zuora.com/">
      <ns1:result>
        <ns1:Id>test-refund-id</ns1:Id>
        <ns1:Success>true</ns1:Success>
      </ns1:result>
    </ns1:createResponse>
  </soapenv:Body>
</soapenv:Envelope>`;
