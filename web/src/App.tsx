import { Navigate, Route, Routes } from 'react-router-dom';

import { HomePage } from './pages/Home';
import { ViewerPage } from './pages/Viewer';

export default function App() {
  return (
    <Routes>
      <Route path="/" element={<HomePage />} />
      <Route path="/viewer" element={<ViewerPage />} />
      <Route path="*" element={<Navigate to="/" replace />} />
    </Routes>
  );
}
