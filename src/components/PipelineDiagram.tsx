import ReactFlow, { Background, type Edge, type Node } from 'reactflow'
import 'reactflow/dist/style.css'
import type { CipherMode } from '../lib/adfgvx'

const STAGES: Record<CipherMode, { id: string; label: string }[]> = {
  encrypt: [
    { id: 'plaintext', label: 'Plaintext' },
    { id: 'substitute', label: 'Polybius substitution' },
    { id: 'fill', label: 'Fill rows under key' },
    { id: 'reorder', label: 'Sort columns by key' },
    { id: 'ciphertext', label: 'Read columns' },
  ],
  decrypt: [
    { id: 'ciphertext', label: 'Ciphertext' },
    { id: 'fill', label: 'Fill columns under sorted key' },
    { id: 'reorder', label: 'Restore key order' },
    { id: 'read', label: 'Read rows' },
    { id: 'plaintext', label: 'Decode symbol pairs' },
  ],
}

const toNodes = (mode: CipherMode): Node[] =>
  STAGES[mode].map((stage, index) => ({
    id: stage.id,
    position: { x: index * 210, y: 0 },
    data: { label: stage.label },
    draggable: false,
    selectable: false,
    style: {
      padding: 12,
      borderRadius: 12,
      border: '1px solid rgba(148,163,184,0.3)',
      background: 'rgba(17,24,39,0.8)',
      color: '#E2E8F0',
      fontSize: 13,
      fontWeight: 600,
      width: 180,
    },
  }))

const toEdges = (mode: CipherMode): Edge[] =>
  STAGES[mode].slice(1).map((stage, index) => ({
    id: `${STAGES[mode][index].id}-${stage.id}`,
    source: STAGES[mode][index].id,
    target: stage.id,
    animated: true,
  }))

export const PipelineDiagram = ({ mode }: { mode: CipherMode }) => (
  <div className="h-40 w-full rounded-lg border border-slate-800/70 bg-slate-950/60">
    <ReactFlow
      nodes={toNodes(mode)}
      edges={toEdges(mode)}
      fitView
      nodesConnectable={false}
      zoomOnScroll={false}
      panOnDrag={false}
      proOptions={{ hideAttribution: true }}
    >
      <Background gap={16} color="#1e293b" />
    </ReactFlow>
  </div>
)
