import { safeExternalHref } from '../utils/links';

type SourceLinkProps = {
  href: string;
  label?: string;
  className?: string;
};

export function SourceLink({ href, label, className }: SourceLinkProps) {
  const safe = safeExternalHref(href);
  const text = (label ?? href).trim();
  if (!safe) return <span className={className ?? 'filePathText'}>{text}</span>;

  return (
    <a
      className={className ?? 'filePathLink'}
      href={safe}
      title={safe}
      target="_blank"
      rel="noreferrer"
      onClick={(e) => e.stopPropagation()}
    >
      {text}
    </a>
  );
}
