import { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';

export function axiosResponse<T>(data: T, status = 200, statusText = 'OK'): AxiosResponse<T> {
  return {
    data,
    status,
    statusText,
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}

export function axiosError(status: number, statusText: string): AxiosError {
  return new AxiosError(
    `Request failed with status code ${status}`,
    AxiosError.ERR_BAD_RESPONSE,
    undefined,
    undefined,
    axiosResponse<unknown>({ message: statusText }, status, statusText),
  );
}
