import React from 'react';

/** Renders `text` with the first case-insensitive occurrence of `query` marked. */
export const Highlight: React.FC<{ text: string; query: string }> = ({ text, query }) => {
  const needle = query.trim().toLowerCase();
  const index = needle ? text.toLowerCase().indexOf(needle) : -1;
  if (index < 0) return <span>{text}</span>;
  const end = index + needle.length;
  return (
    <span>
      {text.slice(0, index)}
      <mark className="bg-transparent text-primary font-semibold">{text.slice(index, end)}</mark>
      {text.slice(end)}
    </span>
  );
};
