import type { DetailRow, ReferenceView, RenderedNode } from '@repo-infographic/server/infographic';

import { accentColor, nodeElementId } from '../utils/links';
import { annotateCode } from '../utils/code';
import { SourceLink } from './SourceLink';

const CODE_PREVIEW_LINES = 12;

type NodeRowProps = {
  node: RenderedNode;
  onToggle: (nodeId: string) => void;
  onReveal: (nodeId: string) => void;
  onInspectCode: (node: RenderedNode) => void;
};

function Reference({ reference, onReveal }: { reference: ReferenceView; onReveal: (nodeId: string) => void }) {
  if (!reference.resolved) return <span className="refText">{reference.label}</span>;
  return (
    <button
      className="linkButton"
      type="button"
      onClick={(e) => {
        e.stopPropagation();
        onReveal(reference.id);
      }}
    >
      {reference.label}
    </button>
  );
}

function Detail({ row, onReveal }: { row: DetailRow; onReveal: (nodeId: string) => void }) {
  switch (row.kind) {
    case 'text':
      return (
        <div className="detailRow">
          <span className="detailLabel">{row.label}</span>
          <span className="detailValue">{row.value}</span>
        </div>
      );
    case 'link':
      return (
        <div className="detailRow">
          <SourceLink href={row.href} label={row.label} />
        </div>
      );
    case 'references':
      return (
        <div className="detailRow">
          <span className="detailLabel">{row.label}</span>
          <span className="detailValue">
            {row.references.map((r, i) => (
              <span key={`${r.id}-${i}`}>
                {i > 0 && ', '}
                <Reference reference={r} onReveal={onReveal} />
              </span>
            ))}
          </span>
        </div>
      );
    case 'connections':
      return (
        <div className="detailRow">
          <span className="detailLabel">Connections</span>
          <span className="detailValue">
            {row.connections.map((c, i) => (
              <span key={`${c.id}-${i}`} className="connection">
                {c.isOutgoing ? '→ ' : '← '}
                <Reference reference={c} onReveal={onReveal} />
                {c.edgeLabel && <span className="edgeLabel"> ({c.edgeLabel})</span>}
              </span>
            ))}
          </span>
        </div>
      );
  }
}

export function NodeRow({ node, onToggle, onReveal, onInspectCode }: NodeRowProps) {
  const color = accentColor(node.variant, node.visualHint);
  const content = node.content;

  return (
    <div className="nodeRow" id={nodeElementId(node.id)} style={{ marginLeft: `${node.depth * 20}px`, borderLeftColor: color }}>
      <button
        className="nodeHeader"
        type="button"
        disabled={!node.expandable}
        aria-expanded={node.expandable ? node.expanded : undefined}
        onClick={() => onToggle(node.id)}
      >
        <span className="chevron">{node.expandable ? (node.expanded ? '▾' : '▸') : '·'}</span>
        <span className="typeBadge" style={{ color }}>
          {node.typeLabel}
        </span>
        <span className="nodeLabel">{node.label}</span>
        {node.visualHint?.badge && <span className="badge">{node.visualHint.badge}</span>}
        {node.childCount > 0 && !node.expanded && <span className="childCount">{node.childCount}</span>}
      </button>
      {node.description && <div className="nodeDescription">{node.description}</div>}

      {node.details.length > 0 && (
        <div className="details">
          {node.details.map((row, i) => (
            <Detail key={i} row={row} onReveal={onReveal} />
          ))}
        </div>
      )}

      {content?.kind === 'code' && (
        <div className="codePreview">
          {content.code ? (
            <>
              <pre className="codeView">
                {annotateCode(content.code, content.annotations, content.lineStart)
                  .slice(0, CODE_PREVIEW_LINES)
                  .map((line) => (
                    <div key={line.number} className={line.notes.length > 0 ? 'codeLine annotated' : 'codeLine'}>
                      <span className="lineNo">{line.number}</span>
                      <code>{line.text}</code>
                    </div>
                  ))}
              </pre>
              <button className="button" type="button" onClick={() => onInspectCode(node)}>
                Inspect code
              </button>
            </>
          ) : (
            <div className="status">No code attached</div>
          )}
        </div>
      )}
    </div>
  );
}
