import axios, { AxiosHeaders, AxiosInstance, AxiosResponse } from 'axios';

export const axiosResponse = <T>(data: T, status = 200): AxiosResponse<T> => ({
  data,
  status,
  statusText: status === 200 ? 'OK' : 'Error',
  headers: {},
  config: { headers: new AxiosHeaders() },
});

/**
 * Routes the next `axios.create` call to a real instance whose verbs are
 * spied, so adapters can be exercised without network access.
 */
export function stubAxiosInstance() {
  const client: AxiosInstance = axios.create();
  const create = jest.spyOn(axios, 'create').mockReturnValue(client);
  const get = jest.spyOn(client, 'get');
  const post = jest.spyOn(client, 'post');
  return { client, create, get, post };
}
