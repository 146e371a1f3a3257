const enUS = {
  completion: {
    listLabel: 'Suggestions',
    clearHistory: 'Clear history',
    historyCleared: 'History cleared',
    enable: 'Enable completion based on history',
    disable: 'Disable completion based on history',
  },
  search: {
    findLabel: 'Find:',
    replaceLabel: 'Replace:',
    findPlaceholder: 'Find text…',
    replacePlaceholder: 'Replace with…',
    find: 'Find',
    replace: 'Replace',
    replaceAll: 'Replace all',
    replaceFind: 'Replace and find',
    modeLabel: 'Mode:',
    modeNormal: 'Normal',
    modeRegex: 'Regex',
    modeTitle: 'How the search expression is interpreted',
    direction: 'Direction',
    directionDown: 'Down',
    directionUp: 'Up',
    caseSensitive: 'Case sensitive',
    wrap: 'Wrap',
    wrapTitle: 'When searching reaches the end, wrap around to the beginning and continue',
    dotAll: 'Dot all',
    dotAllTitle: "Make the '.' special character match any character, including a newline",
    clearFindHistory: 'Clear search history',
    clearReplaceHistory: 'Clear replace history',
  },
};

export default enUS;
