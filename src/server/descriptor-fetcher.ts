import { HTTP_CONFIG } from '../shared/config';
import { parseDescriptor } from '../shared/descriptor';
import { DescriptorFetchError, errorMessage } from '../shared/errors';
import { descriptorUrl } from '../shared/service-url';
import { ServiceDescriptor } from '../shared/types';

/**
 * Fetch and parse {serviceUrl}/info.json
 */
export async function fetchDescriptor(
  serviceUrl: string,
  timeout: number = HTTP_CONFIG.DESCRIPTOR_TIMEOUT
): Promise<ServiceDescriptor> {
  const url = descriptorUrl(serviceUrl);

  let response: Response;
  try {
    response = await fetch(url, {
      headers: HTTP_CONFIG.HEADERS,
      signal: AbortSignal.timeout(timeout)
    });
  } catch (error) {
    throw new DescriptorFetchError(
      `Failed to fetch ${url}: ${errorMessage(error)}`,
      url,
      undefined,
      { cause: error }
    );
  }

  if (!response.ok) {
    throw new DescriptorFetchError(
      `Failed to fetch ${url}: HTTP ${response.status} ${response.statusText}`.trimEnd(),
      url,
      response.status
    );
  }

  let json: unknown;
  try {
    json = await response.json();
  } catch (error) {
    throw new DescriptorFetchError(
      `Invalid JSON in ${url}: ${errorMessage(error)}`,
      url,
      response.status,
      { cause: error }
    );
  }

  return parseDescriptor(json);
}
