import { Injectable, type ArgumentMetadata, type PipeTransform } from '@nestjs/common';
import { ValidationError } from '../errors/RequestErrors';
import { isIsoDate } from '../listing/filters';

/** Path parameters keyed by calendar day, e.g. `/device_counts/:date`. */
@Injectable()
export class ParseIsoDatePipe implements PipeTransform<string, string> {
  transform(value: string, metadata: ArgumentMetadata): string {
    const date = typeof value === 'string' ? value.trim() : '';
    if (!isIsoDate(date)) {
      throw new ValidationError(metadata.data ?? 'date', String(value), 'expecting YYYY-MM-DD');
    }
    return date;
  }
}
