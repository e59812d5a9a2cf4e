import { useCallback, useEffect, useMemo, useState } from 'react';
import { Link } from 'react-router-dom';
import { flattenRenderedTree, type RenderedNode } from '@repo-infographic/server/infographic';

import { CodeModal } from '../components/CodeModal';
import { NodeRow } from '../components/NodeRow';
import { SourceLink } from '../components/SourceLink';
import { useInfographicSession } from '../infographicContext';
import { nodeElementId } from '../utils/links';

export function ViewerPage() {
  const { session, snapshot } = useInfographicSession();
  const [inspecting, setInspecting] = useState<RenderedNode | null>(null);
  const [revealTarget, setRevealTarget] = useState<string | null>(null);

  const rows = useMemo(() => flattenRenderedTree(snapshot.body), [snapshot.body]);

  const onToggle = useCallback((nodeId: string) => {
    session.toggle(nodeId);
  }, [session]);

  const onReveal = useCallback(
    (nodeId: string) => {
      if (session.reveal(nodeId)) setRevealTarget(nodeId);
    },
    [session],
  );

  const closeModal = useCallback(() => setInspecting(null), []);

  useEffect(() => {
    if (!revealTarget) return;
    document.getElementById(nodeElementId(revealTarget))?.scrollIntoView({ behavior: 'smooth', block: 'center' });
    setRevealTarget(null);
  }, [revealTarget, rows]);

  const doc = snapshot.document;
  if (!doc) {
    return (
      <div className="page">
        <div className="status">
          No infographic loaded. <Link to="/">Back to start</Link>
        </div>
      </div>
    );
  }

  const inspectContent = inspecting?.content?.kind === 'code' ? inspecting.content : null;

  return (
    <div className="page">
      <div className="toolbar">
        <Link className="button" to="/">
          Back
        </Link>
        <button className="button" type="button" onClick={() => session.expandAll()}>
          Expand all
        </button>
        <button className="button" type="button" onClick={() => session.collapseAll()}>
          Collapse all
        </button>
        <span className="toolbarNote">{snapshot.expandedCount} expanded</span>
      </div>

      <header className="repoHeader">
        <div className="typeBadge">REPOSITORY</div>
        <h1 className="title">{doc.displayName}</h1>
        {doc.sourceLocator && <SourceLink href={doc.sourceLocator} />}
        {doc.summary && <p>{doc.summary}</p>}
        {doc.pipelineOverview && <p className="overview">{doc.pipelineOverview}</p>}
        {snapshot.issues.length > 0 && (
          <div className="status warning">{snapshot.issues.length} entries were skipped or adjusted while loading</div>
        )}
      </header>

      {snapshot.error && (
        <div className="status error" role="alert">
          {snapshot.error.message}
        </div>
      )}

      <div className="tree">
        {rows.length === 0 && <div className="status">This repository has no phases.</div>}
        {rows.map((node, index) => (
          <NodeRow key={`${index}:${node.id}`} node={node} onToggle={onToggle} onReveal={onReveal} onInspectCode={setInspecting} />
        ))}
      </div>

      {inspecting && inspectContent?.code && (
        <CodeModal
          title={inspecting.label}
          code={inspectContent.code}
          language={inspectContent.language}
          annotations={inspectContent.annotations}
          firstLine={inspectContent.lineStart}
          sourceUrl={inspectContent.sourceUrl}
          onClose={closeModal}
        />
      )}
    </div>
  );
}
