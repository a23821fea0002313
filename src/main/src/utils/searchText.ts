// CJK text has no spaces: every character is its own term, other scripts split on whitespace
const CJK_OR_WORD = /[\u4e00-\u9fff]|[^\s\u4e00-\u9fff,;\uff0c\uff1b\u3001]+/g;

export const tokenizeMixed = (text: string) => text.match(CJK_OR_WORD) ?? [];

/** Lower case without tone marks, so "xuesheng" finds "xuésheng". */
export const foldTerm = (term: string) => term.normalize('NFD').replace(/[\u0300-\u036f]/g, '').toLowerCase();
