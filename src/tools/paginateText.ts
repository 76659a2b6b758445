const paginateText = (text: string, maxChar: number): string[] => {
  const limit = Math.floor(maxChar);
  if (!text.trim() || !(limit > 0)) {
    return [text];
  }

  const pages: string[] = [];
  let index = 0;
  while (index < text.length) {
    let breakIndex = index + Math.min(limit, text.length - index);

    // prefer to break on the last space inside the chunk
    if (breakIndex < text.length && text[breakIndex] !== ' ') {
      const lastSpace = text.lastIndexOf(' ', breakIndex - 1);
      if (lastSpace > index) {
        breakIndex = lastSpace;
      } else if (isSurrogatePair(text, breakIndex - 1) && breakIndex - 1 > index) {
        breakIndex--;
      }
    }

    const page = text.slice(index, breakIndex).trim();
    if (page) {
      pages.push(page);
    }

    index = Math.max(breakIndex, index + 1);
  }

  return pages;
};

function isSurrogatePair(text: string, at: number) {
  const high = text.charCodeAt(at);
  const low = text.charCodeAt(at + 1);
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff;
}

export default paginateText;
