class ErrorWithCode extends Error {
  code: string;
  constructor(message: string, code: string) {
    super(message);

    this.name = 'ErrorWithCode';
    this.code = code;
  }
}

export const hasErrorCode = (error: unknown, code: string): error is {code: string} => {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
};

export default ErrorWithCode;
