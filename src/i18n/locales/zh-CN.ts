import type enUS from '@/i18n/locales/en-US';

const zhCN: typeof enUS = {
  completion: {
    listLabel: '建议',
    clearHistory: '清除历史',
    historyCleared: '历史已清除',
    enable: '启用基于历史的补全',
    disable: '禁用基于历史的补全',
  },
  search: {
    findLabel: '查找：',
    replaceLabel: '替换：',
    findPlaceholder: '查找文本…',
    replacePlaceholder: '替换为…',
    find: '查找',
    replace: '替换',
    replaceAll: '全部替换',
    replaceFind: '替换并查找',
    modeLabel: '模式：',
    modeNormal: '普通',
    modeRegex: '正则',
    modeTitle: '搜索表达式的解释方式',
    direction: '方向',
    directionDown: '向下',
    directionUp: '向上',
    caseSensitive: '区分大小写',
    wrap: '循环',
    wrapTitle: '搜索到末尾时从开头继续',
    dotAll: '点号匹配全部',
    dotAllTitle: "让特殊字符 '.' 匹配包括换行在内的任意字符",
    clearFindHistory: '清除搜索历史',
    clearReplaceHistory: '清除替换历史',
  },
};

export default zhCN;
