// Chooses the validators for one endpoint and interprets their answers
import type {
  CertificateDiscovery,
  DispatchResult,
  EmailValidator,
  InputRecord
} from '../shared/models';
import { fieldAt } from '../shared/utils/csv-parser';
import { classifyEndpointType } from '../shared/utils/validation';

export const NPI_COLUMN = 0;
export const ENDPOINT_TYPE_COLUMN = 1;
export const ENDPOINT_COLUMN = 3;

export interface ValidationDispatcherOptions {
  emailValidator: EmailValidator;
  certificateDiscovery: CertificateDiscovery;
}

export type ValidationDispatcher = (record: InputRecord) => Promise<DispatchResult>;

/**
 * Maps the discovery method to the output protocol; anything but LDAP is DNS
 */
export function resolveCertProtocol(method: unknown): 'ldap' | 'dns' {
  return typeof method === 'string' && method.toUpperCase() === 'LDAP' ? 'ldap' : 'dns';
}

/**
 * Builds the dispatcher. Validator errors are not caught here: a failed call
 * ends the whole session.
 */
export function createValidationDispatcher(options: ValidationDispatcherOptions): ValidationDispatcher {
  const { emailValidator, certificateDiscovery } = options;

  return async (record: InputRecord): Promise<DispatchResult> => {
    const endpointType = classifyEndpointType(fieldAt(record, ENDPOINT_TYPE_COLUMN));

    if (endpointType === 'OTHER') {
      return { outcome: 'NotDirectEndpoint' };
    }

    const endpoint = fieldAt(record, ENDPOINT_COLUMN);
    const validEmail = emailValidator.validate(endpoint);

    if (endpointType === 'EMAIL') {
      return { outcome: validEmail ? 'EmailValid' : 'EmailInvalid', validEmail };
    }

    // Discovery runs without chain verification
    const discovery = await certificateDiscovery.discover(endpoint, false);

    if (discovery.found) {
      const certProtocol = resolveCertProtocol(discovery.method);
      return {
        outcome: certProtocol === 'ldap' ? 'DirectSuccessLdap' : 'DirectSuccessDns',
        validEmail,
        validDirect: true,
        certProtocol
      };
    }

    return {
      outcome: validEmail ? 'DirectFailedButEmailValid' : 'DirectFailedAndEmailInvalid',
      validEmail,
      validDirect: false
    };
  };
}
