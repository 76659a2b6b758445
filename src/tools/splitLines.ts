const splitLines = (text: string) => {
  return text.split(/[\r\n]/).filter((line) => line.length > 0);
};

export default splitLines;
