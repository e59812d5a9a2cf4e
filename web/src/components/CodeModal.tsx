import { useEffect } from 'react';
import type { CodeAnnotation } from '@repo-infographic/server/infographic';

import { annotateCode } from '../utils/code';
import { SourceLink } from './SourceLink';

type CodeModalProps = {
  title: string;
  code: string;
  language?: string;
  annotations: CodeAnnotation[];
  firstLine?: number;
  sourceUrl?: string;
  onClose: () => void;
};

export function CodeModal({ title, code, language, annotations, firstLine, sourceUrl, onClose }: CodeModalProps) {
  useEffect(() => {
    const onKey = (e: KeyboardEvent) => {
      if (e.key === 'Escape') onClose();
    };
    window.addEventListener('keydown', onKey);
    return () => window.removeEventListener('keydown', onKey);
  }, [onClose]);

  const lines = annotateCode(code, annotations, firstLine);

  return (
    <div
      className="modalOverlay"
      role="presentation"
      onMouseDown={(e) => {
        if (e.target === e.currentTarget) onClose();
      }}
    >
      <div className="modal wide" role="dialog" aria-modal="true" aria-label={title}>
        <div className="modalHeader">
          <div className="modalTitle">
            {title}
            {language && <span className="badge">{language}</span>}
          </div>
          <button className="button" type="button" onClick={onClose}>
            Close
          </button>
        </div>
        <div className="modalBody">
          <pre className="codeView">
            {lines.map((line) => (
              <div key={line.number} className={line.notes.length > 0 ? 'codeLine annotated' : 'codeLine'}>
                <span className="lineNo">{line.number}</span>
                <code>{line.text}</code>
                {line.notes.map((note, i) => (
                  <span key={i} className="lineNote">
                    {note}
                  </span>
                ))}
              </div>
            ))}
          </pre>
        </div>
        {sourceUrl && (
          <div className="modalFooter">
            <SourceLink href={sourceUrl} label="View source" />
          </div>
        )}
      </div>
    </div>
  );
}
