import ErrorWithCode from './errorWithCode';

const splitFields = (lines: string[], delimiter = ','): string[][] => {
  if (!delimiter) {
    throw new ErrorWithCode('Delimiter is empty', 'INVALID_DELIMITER');
  }
  return lines.map((line) => line.split(delimiter));
};

export default splitFields;
