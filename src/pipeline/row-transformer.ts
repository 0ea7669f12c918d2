// Output row and status line for one processed endpoint
import type { DispatchResult, InputRecord, OutputRecord, ValidationOutcome } from '../shared/models';
import { fieldAt } from '../shared/utils/csv-parser';
import { ENDPOINT_COLUMN, ENDPOINT_TYPE_COLUMN, NPI_COLUMN } from './validation-dispatcher';

export const STATUS_MESSAGES: Record<ValidationOutcome, string> = {
  NotDirectEndpoint: 'Not a Direct endpoint.. skipping',
  DirectSuccessLdap: 'Success: LDAP Certificate retrieved',
  DirectSuccessDns: 'Success: DNS Certificate retrieved',
  DirectFailedButEmailValid: 'Success: Email data is a properly formed email address',
  DirectFailedAndEmailInvalid: 'Failed: Could not retrieve certificate',
  EmailValid: 'Success: Email data is a properly formed email address',
  EmailInvalid: 'Failed: Invalid email format'
};

export interface TransformedRow {
  output: OutputRecord;
  statusLine: string;
}

function formatValidDirect(validDirect: boolean | undefined): string {
  if (validDirect === undefined) {
    return '';
  }

  return validDirect ? '1' : '0';
}

export function transformRow(record: InputRecord, result: DispatchResult): TransformedRow {
  const output: OutputRecord = {
    NPI: fieldAt(record, NPI_COLUMN),
    EndpointType: fieldAt(record, ENDPOINT_TYPE_COLUMN),
    Endpoint: fieldAt(record, ENDPOINT_COLUMN),
    ValidEmail: result.validEmail === undefined ? '' : String(result.validEmail),
    ValidDirect: formatValidDirect(result.validDirect),
    cert_protocol: result.certProtocol ?? ''
  };

  return {
    output,
    statusLine: `Processing ${output.Endpoint} for NPI ${output.NPI}: ${STATUS_MESSAGES[result.outcome]}`
  };
}
