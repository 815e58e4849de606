import { AxiosError, AxiosHeaders } from 'axios';

/** AxiosError as the http adapter raises it for a non-2xx response */
export function httpError(status: number): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(
    `Request failed with status code ${status}`,
    AxiosError.ERR_BAD_RESPONSE,
    config,
    {},
    { data: {}, status, statusText: 'Error', headers: {}, config }
  );
}

/** AxiosError raised when no response arrived */
export function networkError(code: string | undefined, message: string): AxiosError {
  return new AxiosError(message, code, { headers: new AxiosHeaders() }, {});
}
